import { Picker, type PickerOptions } from "./picker.js";
import { PreviewCache } from "./preview-cache.js";
import type { FileLocation, LiveDocumentLookup, PreviewResult } from "./types.js";

/** Below this terminal width the preview pane is not shown. */
export const MIN_SCREEN_WIDTH_FOR_PREVIEW = 80;

export interface FilePickerOptions<T> extends PickerOptions<T> {
	/** Maps a candidate to the file (and line) its preview shows. */
	locate: (candidate: T) => FileLocation | undefined;
	liveDocuments?: LiveDocumentLookup;
	cache?: PreviewCache;
}

export interface Preview {
	location: FileLocation;
	result: PreviewResult;
}

export interface PreviewLines {
	/** 0-based index of the first line shown. */
	firstLine: number;
	lines: string[];
	/** Index into `lines` of the target line, if it is visible. */
	highlight?: number;
}

const noLiveDocuments: LiveDocumentLookup = () => undefined;

export class FilePicker<T> extends Picker<T> {
	private readonly locate: (candidate: T) => FileLocation | undefined;
	private readonly liveDocuments: LiveDocumentLookup;
	private readonly cache: PreviewCache;

	constructor(options: FilePickerOptions<T>) {
		super(options);
		this.locate = options.locate;
		this.liveDocuments = options.liveDocuments ?? noLiveDocuments;
		this.cache = options.cache ?? new PreviewCache();
	}

	get previewCache(): PreviewCache {
		return this.cache;
	}

	currentLocation(): FileLocation | undefined {
		const selected = this.selection();
		return selected === undefined ? undefined : this.locate(selected);
	}

	/** Preview for the highlighted candidate, loading it on first access. */
	preview(): Preview | undefined {
		const location = this.currentLocation();
		if (!location) return undefined;

		return {
			location,
			result: this.cache.getOrLoad(location.path, this.liveDocuments),
		};
	}
}

/** Slices `height` lines of text so that the 1-based `line` sits in the middle. */
export function previewWindow(text: string, line: number | undefined, height: number): PreviewLines {
	const all = text.split(/\r?\n/);
	const rows = Math.max(Math.floor(height), 1);
	const target = line === undefined ? 0 : Math.max(line - 1, 0);
	const firstLine = Math.max(target - Math.floor(rows / 2), 0);
	const lines = all.slice(firstLine, firstLine + rows);

	const window: PreviewLines = { firstLine, lines };
	if (line !== undefined && target - firstLine < lines.length) {
		window.highlight = target - firstLine;
	}
	return window;
}
