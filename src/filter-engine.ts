import type { ActiveScope } from "./scope.js";
import type { DisplayFormatter, MatchResult, ScoringFunction } from "./types.js";

/**
 * Ranks the candidate universe against a query.
 *
 * Every rescan scores each eligible candidate from scratch; there is no
 * incremental diffing between keystrokes. This assumes interactively sized
 * universes (hundreds up to tens of thousands of candidates).
 */
export class FilterEngine<T> {
	private readonly items: readonly T[];
	private readonly format: DisplayFormatter<T>;
	private readonly scorer: ScoringFunction;
	private matches: MatchResult[] = [];

	constructor(items: readonly T[], format: DisplayFormatter<T>, scorer: ScoringFunction) {
		this.items = items;
		this.format = format;
		this.scorer = scorer;
	}

	get size(): number {
		return this.items.length;
	}

	get view(): readonly MatchResult[] {
		return this.matches;
	}

	rescan(query: string, scope: ActiveScope): readonly MatchResult[] {
		const matches: MatchResult[] = [];

		for (const [index, item] of this.items.entries()) {
			if (!scope.has(index)) continue;

			const score = this.scorer(this.format(item), query);
			if (score === undefined) continue;

			matches.push({ index, score });
		}

		matches.sort((a, b) => b.score - a.score || a.index - b.index);
		this.matches = matches;
		return matches;
	}

	candidate(index: number): T | undefined {
		return this.items[index];
	}
}
