import type { Candidate } from "./candidates.js";
import { formatCandidate, locateCandidate } from "./candidates.js";
import type { WinnowConfig } from "./config.js";
import { OpenDocuments } from "./documents.js";
import { FilePicker } from "./file-picker.js";
import { PickerView } from "./picker-view.js";
import { PreviewCache } from "./preview-cache.js";
import type { PickerAction } from "./types.js";

export interface Selection {
	candidate: Candidate;
	action: PickerAction;
}

export function createPicker(
	candidates: readonly Candidate[],
	config: Pick<WinnowConfig, "cacheSize">,
	onSelect: (selection: Selection) => void,
	documents: OpenDocuments = new OpenDocuments(),
): FilePicker<Candidate> {
	return new FilePicker<Candidate>({
		items: candidates,
		format: formatCandidate,
		locate: locateCandidate,
		dispatch: (candidate, action) => onSelect({ candidate, action }),
		liveDocuments: documents.lookup,
		cache: new PreviewCache({ capacity: config.cacheSize }),
	});
}

/** Runs the picker in the terminal until the user confirms or cancels. */
export async function runSession(
	candidates: readonly Candidate[],
	config: WinnowConfig,
): Promise<Selection | undefined> {
	const result: { selection?: Selection } = {};
	const picker = createPicker(candidates, config, (selection) => {
		result.selection = selection;
	});

	const view = new PickerView({
		picker,
		preview: config.preview,
		title: `winnow - ${config.directory}`,
	});
	await view.start();

	return result.selection;
}
