import fg from "fast-glob";
import { relative } from "node:path";
import { SymbolIndexer } from "./indexer.js";
import type { CodeSymbol, FileLocation, PickerAction } from "./types.js";

export const DEFAULT_PATTERNS = ["**/*"];
export const DEFAULT_IGNORE = ["**/node_modules/**", "**/dist/**", "**/build/**", "**/.git/**"];

export interface FileCandidate {
	kind: "file";
	path: string;
	relativePath: string;
}

export interface SymbolCandidate {
	kind: "symbol";
	symbol: CodeSymbol;
	relativePath: string;
}

export type Candidate = FileCandidate | SymbolCandidate;

export type CandidateMode = "files" | "symbols";

/** What the picker needs from each kind of candidate. */
interface CandidateKind<C extends Candidate> {
	format(candidate: C): string;
	locate(candidate: C): FileLocation;
	/** Text printed for the chosen candidate. */
	describe(candidate: C): string;
}

const fileKind: CandidateKind<FileCandidate> = {
	format: (candidate) => candidate.relativePath,
	locate: (candidate) => ({ path: candidate.path }),
	describe: (candidate) => candidate.path,
};

const symbolKind: CandidateKind<SymbolCandidate> = {
	format: ({ symbol, relativePath }) => `${symbol.name}  ${symbol.type} ${relativePath}:${symbol.line}`,
	locate: ({ symbol }) => ({ path: symbol.file, line: symbol.line }),
	describe: ({ symbol }) => `${symbol.file}:${symbol.line}:${symbol.column}`,
};

export function formatCandidate(candidate: Candidate): string {
	switch (candidate.kind) {
		case "file":
			return fileKind.format(candidate);
		case "symbol":
			return symbolKind.format(candidate);
	}
}

export function locateCandidate(candidate: Candidate): FileLocation {
	switch (candidate.kind) {
		case "file":
			return fileKind.locate(candidate);
		case "symbol":
			return symbolKind.locate(candidate);
	}
}

export function describeCandidate(candidate: Candidate): string {
	switch (candidate.kind) {
		case "file":
			return fileKind.describe(candidate);
		case "symbol":
			return symbolKind.describe(candidate);
	}
}

export interface CollectOptions {
	patterns?: string[];
	ignore?: string[];
}

/** Files under `directory`, sorted by relative path so candidate order is stable. */
export async function collectFiles(directory: string, options: CollectOptions = {}): Promise<FileCandidate[]> {
	const files = await fg(options.patterns ?? DEFAULT_PATTERNS, {
		cwd: directory,
		absolute: true,
		onlyFiles: true,
		ignore: options.ignore ?? DEFAULT_IGNORE,
	});

	return files
		.map((path): FileCandidate => ({ kind: "file", path, relativePath: relative(directory, path) }))
		.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}

export async function collectSymbols(
	directory: string,
	options: CollectOptions = {},
	indexer: SymbolIndexer = new SymbolIndexer(),
): Promise<SymbolCandidate[]> {
	const files = await collectFiles(directory, options);
	const symbols = await indexer.indexFiles(files.map((file) => file.path));

	return symbols.map((symbol): SymbolCandidate => ({
		kind: "symbol",
		symbol,
		relativePath: relative(directory, symbol.file),
	}));
}

export async function collectCandidates(
	directory: string,
	mode: CandidateMode,
	options: CollectOptions = {},
): Promise<Candidate[]> {
	return mode === "symbols" ? collectSymbols(directory, options) : collectFiles(directory, options);
}

/** Output line for a confirmed pick, optionally prefixed with the action and a tab. */
export function formatSelection(candidate: Candidate, action: PickerAction, printAction: boolean): string {
	const description = describeCandidate(candidate);
	return printAction ? `${action}\t${description}` : description;
}
