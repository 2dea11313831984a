import Fuse from "fuse.js";
import type { ScoringFunction } from "./types.js";

export interface FuseScorerOptions {
	threshold?: number;
	ignoreLocation?: boolean;
	isCaseSensitive?: boolean;
}

/**
 * Fuzzy scorer backed by fuse.js. Fuse reports 0 for a perfect match and
 * grows towards 1 as the match degrades, so the score is inverted to keep
 * "higher is more relevant". An empty pattern matches every text with the
 * same score. Location is ignored by default so a match deep inside a long
 * path scores the same as one at the start.
 */
export class FuseScorer {
	private fuse: Fuse<string>;

	constructor(options: FuseScorerOptions = {}) {
		const { threshold = 0.4, ignoreLocation = true, isCaseSensitive = false } = options;

		this.fuse = new Fuse<string>([], {
			threshold,
			ignoreLocation,
			isCaseSensitive,
			includeScore: true,
			minMatchCharLength: 1,
			findAllMatches: true,
		});
	}

	score(text: string, pattern: string): number | undefined {
		if (pattern === "") {
			return 1;
		}

		// A one-element collection lets the same instance score each candidate
		this.fuse.setCollection([text]);
		const [result] = this.fuse.search(pattern, { limit: 1 });
		if (!result) {
			return undefined;
		}

		return 1 - (result.score ?? 1);
	}

	toScoringFunction(): ScoringFunction {
		return (text, pattern) => this.score(text, pattern);
	}
}

export function createFuseScorer(options?: FuseScorerOptions): ScoringFunction {
	return new FuseScorer(options).toScoringFunction();
}
