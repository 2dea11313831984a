import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { SymbolIndexer, extractSymbols, languageOf } from "../../src/indexer.js";
import type { CodeSymbol } from "../../src/types.js";

const summarize = (symbols: CodeSymbol[]) => symbols.map((s) => `${s.type}:${s.name}:${s.line}`);

describe("extractSymbols", () => {
	test("should extract declarations from a TypeScript file", () => {
		const fixture = resolve(process.cwd(), "tests/fixtures/sample.ts");
		const symbols = extractSymbols(fixture, readFileSync(fixture, "utf-8"));

		expect(summarize(symbols)).toEqual([
			"interface:Bookmark:2",
			"type:BookmarkSort:7",
			"enum:Visibility:9",
			"class:BookmarkShelf:14",
			"constant:MAX_BOOKMARKS:22",
			"function:describeBookmark:24",
			"function:normalizeTitle:28",
			"variable:lastOpened:30",
		]);
	});

	test("should record the column of the symbol name and the trimmed line", () => {
		const [symbol] = extractSymbols("/src/shelf.ts", "  export class Shelf {}");

		expect(symbol).toEqual({
			name: "Shelf",
			type: "class",
			file: "/src/shelf.ts",
			line: 1,
			column: 16,
			context: "export class Shelf {}",
		});
	});

	test("should not treat identifiers that start with a keyword as declarations", () => {
		expect(extractSymbols("/src/a.js", "functionTable();\n// function hidden() {}")).toEqual([]);
	});

	test("should extract Python definitions", () => {
		const source = ["RETRIES = 3", "limit = 10", "class Fetcher:", "    async def fetch(self):", "# def commented():"].join("\n");

		expect(summarize(extractSymbols("/app/fetch.py", source))).toEqual([
			"constant:RETRIES:1",
			"variable:limit:2",
			"class:Fetcher:3",
			"function:fetch:4",
		]);
	});

	test("should extract Go and Rust definitions", () => {
		const go = ["type Server struct {", "type Handler interface {", "func (s *Server) Serve() {", "var ready bool"].join("\n");
		const rust = ["pub struct Point {", "pub trait Shape {", "fn area() -> f64 {", "const LIMIT: u32 = 4;"].join("\n");

		expect(summarize(extractSymbols("/svc/main.go", go))).toEqual([
			"class:Server:1",
			"interface:Handler:2",
			"function:Serve:3",
			"variable:ready:4",
		]);
		expect(summarize(extractSymbols("/lib/shape.rs", rust))).toEqual([
			"class:Point:1",
			"interface:Shape:2",
			"function:area:3",
			"constant:LIMIT:4",
		]);
	});

	test("should ignore files in unknown languages", () => {
		expect(languageOf("/README.md")).toBeUndefined();
		expect(extractSymbols("/README.md", "const notCode = 1")).toEqual([]);
	});
});

describe("SymbolIndexer", () => {
	let dir: string;
	let indexer: SymbolIndexer;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "winnow-index-"));
		indexer = new SymbolIndexer();
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
		vi.restoreAllMocks();
	});

	test("should index files and return symbols in input order", async () => {
		await writeFile(join(dir, "b.ts"), "export function second() {}\n");
		await writeFile(join(dir, "a.py"), "def first():\n    pass\n");

		const symbols = await indexer.indexFiles([join(dir, "b.ts"), join(dir, "a.py")]);

		expect(symbols.map((s) => s.name)).toEqual(["second", "first"]);
		expect(indexer.getSymbolsByFile(join(dir, "a.py")).map((s) => s.name)).toEqual(["first"]);
	});

	test("should reuse cached symbols for unchanged files", async () => {
		await writeFile(join(dir, "c.ts"), "const answer = 42;\n");

		const first = await indexer.indexFile(join(dir, "c.ts"));
		const second = await indexer.indexFile(join(dir, "c.ts"));

		expect(second).toBe(first);
	});

	test("should warn and skip files that cannot be read", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

		const symbols = await indexer.indexFile(join(dir, "missing.ts"));

		expect(symbols).toEqual([]);
		expect(warn).toHaveBeenCalledOnce();
		expect(warn.mock.calls[0]?.[0]).toBe(`Failed to index ${join(dir, "missing.ts")}:`);
	});

	test("should forget everything on clearCache", async () => {
		await writeFile(join(dir, "d.ts"), "let counter = 0;\n");
		await indexer.indexFile(join(dir, "d.ts"));

		indexer.clearCache();

		expect(indexer.getSymbolsByFile(join(dir, "d.ts"))).toEqual([]);
	});
});
