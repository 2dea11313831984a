export { ActiveScope } from "./scope.js";
export { SelectionCursor } from "./cursor.js";
export { FilterEngine } from "./filter-engine.js";
export { pageWindow, type PageWindow } from "./windowing.js";
export {
	PreviewCache,
	canonicalizePath,
	loadTextFile,
	DEFAULT_PREVIEW_CACHE_CAPACITY,
	type PreviewCacheOptions,
} from "./preview-cache.js";
export { OpenDocuments } from "./documents.js";
export { FuseScorer, createFuseScorer, type FuseScorerOptions } from "./scorer.js";
export { Picker, DEFAULT_ROWS, type PickerEntry, type PickerOptions, type PickerWindow } from "./picker.js";
export {
	FilePicker,
	MIN_SCREEN_WIDTH_FOR_PREVIEW,
	previewWindow,
	type FilePickerOptions,
	type Preview,
	type PreviewLines,
} from "./file-picker.js";
export { defaultKeymap, resolveKey, type Keymap } from "./keymap.js";
export { PickerView, type PickerViewOptions } from "./picker-view.js";
export type * from "./types.js";
export { SymbolIndexer, extractSymbols, languageOf } from "./indexer.js";
export {
	collectCandidates,
	collectFiles,
	collectSymbols,
	describeCandidate,
	formatCandidate,
	formatSelection,
	locateCandidate,
	type Candidate,
	type CandidateMode,
	type FileCandidate,
	type SymbolCandidate,
} from "./candidates.js";
