import { readFileSync, realpathSync, statSync } from "node:fs";
import { resolve } from "node:path";
import type { FileLoader, LiveDocumentLookup, PreviewDocument, PreviewResult } from "./types.js";

export const DEFAULT_PREVIEW_CACHE_CAPACITY = 100;
export const MAX_PREVIEW_BYTES = 10 * 1024 * 1024;

/** Absolute, symlink-resolved form of a path. Throws when the path does not exist. */
export function canonicalizePath(path: string): string {
	return realpathSync(resolve(path));
}

export function loadTextFile(path: string): PreviewDocument {
	const stats = statSync(path);
	if (!stats.isFile()) {
		throw new Error(`${path} is not a regular file`);
	}
	if (stats.size > MAX_PREVIEW_BYTES) {
		throw new Error(`${path} is too large to preview (${stats.size} bytes)`);
	}

	const buffer = readFileSync(path);
	if (buffer.includes(0)) {
		throw new Error(`${path} looks like a binary file`);
	}

	return { path, text: buffer.toString("utf-8") };
}

export interface PreviewCacheOptions {
	/** Maximum number of canonical paths kept; `Infinity` disables eviction. */
	capacity?: number;
	loader?: FileLoader;
	canonicalize?: (path: string) => string;
}

/**
 * Lazily loaded preview content keyed by canonical path.
 *
 * Live documents always win: the lookup runs on every request, so an open
 * document never gets shadowed by a stale cached copy. Nothing notifies the
 * cache about changes made on disk outside the session; such edits are not
 * seen until the entry is evicted or the cache is cleared.
 */
export class PreviewCache {
	private entries = new Map<string, PreviewDocument>();
	private readonly capacity: number;
	private readonly loader: FileLoader;
	private readonly canonicalize: (path: string) => string;

	constructor(options: PreviewCacheOptions = {}) {
		const capacity = options.capacity ?? DEFAULT_PREVIEW_CACHE_CAPACITY;
		if (!(capacity >= 1)) {
			throw new RangeError(`Preview cache capacity must be at least 1, got ${capacity}`);
		}

		this.capacity = capacity;
		this.loader = options.loader ?? loadTextFile;
		this.canonicalize = options.canonicalize ?? canonicalizePath;
	}

	get size(): number {
		return this.entries.size;
	}

	has(canonicalPath: string): boolean {
		return this.entries.has(canonicalPath);
	}

	getOrLoad(path: string, liveDocuments: LiveDocumentLookup): PreviewResult {
		const canonical = this.resolvePath(path);
		if (canonical.status === "unavailable") return canonical;

		const known = this.lookup(canonical.path, liveDocuments, true);
		if (known) return known;

		let document: PreviewDocument;
		try {
			document = this.loader(canonical.path);
		} catch (error) {
			return {
				status: "unavailable",
				path: canonical.path,
				reason: describeError(error),
			};
		}

		this.insert(canonical.path, document);
		return { status: "loaded", path: canonical.path, origin: "fresh", document };
	}

	/** Like `getOrLoad` but never loads: reports `pending` where a load would be needed. */
	peek(path: string, liveDocuments: LiveDocumentLookup): PreviewResult {
		const canonical = this.resolvePath(path);
		if (canonical.status === "unavailable") return canonical;

		return (
			this.lookup(canonical.path, liveDocuments, false) ?? {
				status: "pending",
				path: canonical.path,
			}
		);
	}

	clear(): void {
		this.entries.clear();
	}

	private resolvePath(
		path: string,
	): { status: "resolved"; path: string } | { status: "unavailable"; path: string; reason: string } {
		try {
			return { status: "resolved", path: this.canonicalize(path) };
		} catch (error) {
			return { status: "unavailable", path, reason: describeError(error) };
		}
	}

	private lookup(
		canonicalPath: string,
		liveDocuments: LiveDocumentLookup,
		touch: boolean,
	): PreviewResult | undefined {
		const live = liveDocuments(canonicalPath);
		if (live) {
			return { status: "loaded", path: canonicalPath, origin: "live", document: live };
		}

		const cached = this.entries.get(canonicalPath);
		if (!cached) return undefined;

		if (touch) {
			// Re-insert to mark as most recently used
			this.entries.delete(canonicalPath);
			this.entries.set(canonicalPath, cached);
		}
		return { status: "loaded", path: canonicalPath, origin: "cached", document: cached };
	}

	private insert(canonicalPath: string, document: PreviewDocument): void {
		this.entries.set(canonicalPath, document);

		while (this.entries.size > this.capacity) {
			const oldest = this.entries.keys().next();
			if (oldest.done) break;
			this.entries.delete(oldest.value);
		}
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
