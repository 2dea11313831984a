/**
 * Scores a query against a candidate's display text. Returns `undefined`
 * when the pattern does not match; larger scores rank higher.
 */
export type ScoringFunction = (text: string, pattern: string) => number | undefined;

export type DisplayFormatter<T> = (candidate: T) => string;

export type PickerAction = "open" | "replace" | "horizontal-split" | "vertical-split";

export type ActionDispatcher<T> = (candidate: T, action: PickerAction) => void;

export interface MatchResult {
	index: number;
	score: number;
}

/** File path and optional 1-based line used to align the preview. */
export interface FileLocation {
	path: string;
	line?: number;
}

export interface PreviewDocument {
	path: string;
	text: string;
}

/** Read-only view of documents the host already holds open, keyed by canonical path. */
export type LiveDocumentLookup = (canonicalPath: string) => PreviewDocument | undefined;

/** Cold load of a path's content. Throws when the content cannot be read. */
export type FileLoader = (path: string) => PreviewDocument;

export type PreviewOrigin = "live" | "cached" | "fresh";

export type PreviewResult =
	| { status: "loaded"; path: string; origin: PreviewOrigin; document: PreviewDocument }
	| { status: "unavailable"; path: string; reason: string }
	| { status: "pending"; path: string };

export type PickerCommand =
	| { type: "move-up" }
	| { type: "move-down" }
	| { type: "page-up" }
	| { type: "page-down" }
	| { type: "confirm"; action: PickerAction }
	| { type: "cancel" }
	| { type: "save-scope" }
	| { type: "reset" }
	| { type: "query"; text: string };

export type PickerOutcome = "consumed" | "closed";

export interface CodeSymbol {
	name: string;
	type: SymbolType;
	file: string;
	line: number;
	column: number;
	context?: string;
}

export type SymbolType =
	| "function"
	| "variable"
	| "class"
	| "interface"
	| "type"
	| "enum"
	| "constant";

export interface IndexedFile {
	path: string;
	symbols: CodeSymbol[];
	lastModified: number;
}
