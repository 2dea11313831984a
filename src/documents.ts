import { canonicalizePath } from "./preview-cache.js";
import type { LiveDocumentLookup, PreviewDocument } from "./types.js";

/**
 * Documents the host holds open in memory, possibly with unsaved edits.
 * Previews read through `lookup` before touching the disk.
 */
export class OpenDocuments {
	private documents = new Map<string, PreviewDocument>();
	private readonly canonicalize: (path: string) => string;

	constructor(canonicalize: (path: string) => string = canonicalizePath) {
		this.canonicalize = canonicalize;
	}

	get size(): number {
		return this.documents.size;
	}

	/** Opens or replaces the in-memory content of a path. */
	open(path: string, text: string): PreviewDocument {
		const canonical = this.canonicalize(path);
		const document = { path: canonical, text };
		this.documents.set(canonical, document);
		return document;
	}

	close(path: string): boolean {
		return this.documents.delete(this.canonicalize(path));
	}

	readonly lookup: LiveDocumentLookup = (canonicalPath) => this.documents.get(canonicalPath);
}
