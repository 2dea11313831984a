import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import type { CodeSymbol, IndexedFile, SymbolType } from "./types.js";

interface SymbolRule {
	pattern: RegExp;
	type: SymbolType;
}

export type Language = "script" | "python" | "rust" | "go";

// Rules are tried in order; the first one that matches a line wins.
const rules: Record<Language, SymbolRule[]> = {
	script: [
		{ pattern: /\bfunction\b\s*\*?\s*(\w+)/, type: "function" },
		{
			pattern: /\b(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s+)?(?:function\b|\([^)]*\)\s*(?::[^=]+)?=>|\w+\s*=>)/,
			type: "function",
		},
		{ pattern: /\bclass\s+(\w+)/, type: "class" },
		{ pattern: /\binterface\s+(\w+)/, type: "interface" },
		{ pattern: /\btype\s+(\w+)\s*(?:<[^>]*>\s*)?=/, type: "type" },
		{ pattern: /\benum\s+(\w+)/, type: "enum" },
		{ pattern: /\bconst\s+(\w+)/, type: "constant" },
		{ pattern: /\b(?:let|var)\s+(\w+)/, type: "variable" },
	],
	python: [
		{ pattern: /^\s*(?:async\s+)?def\s+(\w+)/, type: "function" },
		{ pattern: /^\s*class\s+(\w+)/, type: "class" },
		{ pattern: /^([A-Z][A-Z0-9_]*)\s*=/, type: "constant" },
		{ pattern: /^(\w+)\s*=/, type: "variable" },
	],
	rust: [
		{ pattern: /\bfn\s+(\w+)/, type: "function" },
		{ pattern: /\bstruct\s+(\w+)/, type: "class" },
		{ pattern: /\benum\s+(\w+)/, type: "enum" },
		{ pattern: /\btrait\s+(\w+)/, type: "interface" },
		{ pattern: /\btype\s+(\w+)/, type: "type" },
		{ pattern: /\b(?:const|static)\s+(\w+)/, type: "constant" },
	],
	go: [
		{ pattern: /^func\s+(?:\([^)]*\)\s*)?(\w+)/, type: "function" },
		{ pattern: /^type\s+(\w+)\s+struct\b/, type: "class" },
		{ pattern: /^type\s+(\w+)\s+interface\b/, type: "interface" },
		{ pattern: /^type\s+(\w+)/, type: "type" },
		{ pattern: /^\s*const\s+(\w+)/, type: "constant" },
		{ pattern: /^\s*var\s+(\w+)/, type: "variable" },
	],
};

const languages: Record<string, Language> = {
	".ts": "script",
	".tsx": "script",
	".mts": "script",
	".cts": "script",
	".js": "script",
	".jsx": "script",
	".mjs": "script",
	".cjs": "script",
	".py": "python",
	".rs": "rust",
	".go": "go",
};

export function languageOf(filePath: string): Language | undefined {
	return languages[extname(filePath).toLowerCase()];
}

/** Line-based symbol extraction. Files in unknown languages yield no symbols. */
export function extractSymbols(filePath: string, content: string): CodeSymbol[] {
	const language = languageOf(filePath);
	if (!language) return [];

	const symbols: CodeSymbol[] = [];
	const lines = content.split("\n");

	for (const [i, line] of lines.entries()) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("//") || trimmed.startsWith("#")) continue;

		for (const rule of rules[language]) {
			const match = rule.pattern.exec(line);
			const name = match?.[1];
			if (!match || !name) continue;

			symbols.push({
				name,
				type: rule.type,
				file: filePath,
				line: i + 1,
				column: line.indexOf(name, match.index) + 1,
				context: trimmed,
			});
			break;
		}
	}

	return symbols;
}

export class SymbolIndexer {
	private cache = new Map<string, IndexedFile>();

	async indexFile(filePath: string): Promise<CodeSymbol[]> {
		try {
			const stats = await stat(filePath);
			const existing = this.cache.get(filePath);

			if (existing && existing.lastModified >= stats.mtime.getTime()) {
				return existing.symbols;
			}

			const content = await readFile(filePath, "utf-8");
			const symbols = extractSymbols(filePath, content);

			this.cache.set(filePath, {
				path: filePath,
				symbols,
				lastModified: stats.mtime.getTime(),
			});
			return symbols;
		} catch (error) {
			console.warn(`Failed to index ${filePath}:`, error);
			return [];
		}
	}

	/** Indexes files concurrently; symbols come back in the order of `filePaths`. */
	async indexFiles(filePaths: readonly string[]): Promise<CodeSymbol[]> {
		const perFile = await Promise.all(filePaths.map((file) => this.indexFile(file)));
		return perFile.flat();
	}

	getSymbolsByFile(filePath: string): CodeSymbol[] {
		return this.cache.get(filePath)?.symbols ?? [];
	}

	clearCache(): void {
		this.cache.clear();
	}
}
