import { describe, test, expect, beforeEach } from "vitest";
import { Picker } from "../../src/picker.js";
import { FuseScorer, createFuseScorer } from "../../src/scorer.js";
import type { ScoringFunction } from "../../src/types.js";
import { fruits, identity } from "../helpers/scorers.js";

describe("FuseScorer", () => {
	let score: ScoringFunction;

	beforeEach(() => {
		score = createFuseScorer();
	});

	describe("Scoring", () => {
		test("should give every text the same score for an empty pattern", () => {
			expect(score("apple.txt", "")).toBe(1);
			expect(score("banana.txt", "")).toBe(1);
		});

		test("should reject texts that do not match", () => {
			expect(score("apple.txt", "xyz")).toBeUndefined();
			expect(score("banana.txt", "ap")).toBeUndefined();
		});

		test("should score closer matches higher", () => {
			const exact = score("apple.txt", "app");
			const fuzzy = score("apple.txt", "apx");

			expect(exact).toBeGreaterThan(0.99);
			expect(fuzzy).toBeGreaterThan(0);
			expect(fuzzy).toBeLessThan(exact ?? 0);
		});

		test("should ignore case by default", () => {
			expect(score("README.md", "readme")).toBeGreaterThan(0.99);
		});

		test("should find a name deep inside a long path", () => {
			const deep = score("packages/frontend/src/components/widgets/forms/inputs/Button.tsx", "Button");

			expect(deep).toBeGreaterThan(0.99);
			expect(deep).toBe(score("src/Button.tsx", "Button"));
		});

		test("should honour an explicit case-sensitive setting", () => {
			const strict = new FuseScorer({ isCaseSensitive: true });

			expect(strict.score("README.md", "readme")).toBeUndefined();
			expect(strict.score("README.md", "README")).toBeGreaterThan(0.99);
		});
	});

	describe("As the picker default", () => {
		let picker: Picker<string>;

		beforeEach(() => {
			picker = new Picker({ items: fruits, format: identity, dispatch: () => {} });
		});

		test("should keep the matching fruits in insertion order", () => {
			picker.setQuery("ap");

			expect(picker.matches.map((match) => match.index)).toEqual([0, 2]);
		});

		test("should intersect a saved scope with later queries", () => {
			picker.setQuery("ap");
			picker.saveScope();
			picker.setQuery("pric");

			expect(picker.matches.map((match) => match.index)).toEqual([2]);
			expect(picker.selection()).toBe("apricot.txt");
		});
	});
});
