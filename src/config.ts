import { resolve } from "node:path";
import { DEFAULT_IGNORE, DEFAULT_PATTERNS, type CandidateMode } from "./candidates.js";
import { DEFAULT_PREVIEW_CACHE_CAPACITY } from "./preview-cache.js";

/** Options as commander hands them over. */
export interface CliOptions {
	mode?: string;
	patterns?: string;
	ignore?: string;
	preview?: boolean;
	cacheSize?: string;
	printAction?: boolean;
}

export interface WinnowConfig {
	directory: string;
	mode: CandidateMode;
	patterns: string[];
	ignore: string[];
	preview: boolean;
	cacheSize: number;
	printAction: boolean;
}

const modes: readonly CandidateMode[] = ["files", "symbols"];

function isMode(value: string): value is CandidateMode {
	return modes.some((mode) => mode === value);
}

function splitList(value: string | undefined, fallback: string[]): string[] {
	if (value === undefined) return fallback;
	return value
		.split(",")
		.map((part) => part.trim())
		.filter((part) => part.length > 0);
}

function parseCacheSize(value: string | undefined): number {
	if (value === undefined || value.trim() === "") return DEFAULT_PREVIEW_CACHE_CAPACITY;

	const size = Number.parseInt(value, 10);
	if (!Number.isFinite(size) || size < 1) {
		throw new Error(`Invalid preview cache size "${value}": expected a positive integer`);
	}
	return size;
}

/**
 * Merges command-line options with environment overrides.
 * `WINNOW_PREVIEW_CACHE_SIZE` applies when `--cache-size` is absent and a
 * non-empty `WINNOW_NO_PREVIEW` turns the preview pane off.
 */
export function resolveConfig(
	directory: string | undefined,
	options: CliOptions,
	env: NodeJS.ProcessEnv = process.env,
): WinnowConfig {
	const mode = options.mode ?? "files";
	if (!isMode(mode)) {
		throw new Error(`Unknown mode "${mode}": expected one of ${modes.join(", ")}`);
	}

	return {
		directory: resolve(directory ?? "."),
		mode,
		patterns: splitList(options.patterns, DEFAULT_PATTERNS),
		ignore: splitList(options.ignore, DEFAULT_IGNORE),
		preview: options.preview !== false && !env.WINNOW_NO_PREVIEW,
		cacheSize: parseCacheSize(options.cacheSize ?? env.WINNOW_PREVIEW_CACHE_SIZE),
		printAction: options.printAction ?? false,
	};
}
