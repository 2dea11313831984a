import { describe, test, expect } from "vitest";
import { ActiveScope } from "../../src/scope.js";

describe("ActiveScope", () => {
	test("should admit every index while unrestricted", () => {
		const scope = new ActiveScope();

		expect(scope.isActive).toBe(false);
		expect(scope.size).toBeUndefined();
		expect(scope.has(0)).toBe(true);
		expect(scope.has(9999)).toBe(true);
	});

	test("should admit exactly the saved indices", () => {
		const scope = new ActiveScope();
		scope.save([7, 2, 11, 4]);

		expect(scope.isActive).toBe(true);
		expect(scope.size).toBe(4);
		expect([0, 1, 2, 3, 4, 5, 6, 7, 8, 11, 12].filter((index) => scope.has(index))).toEqual([2, 4, 7, 11]);
	});

	test("should replace the previous scope instead of merging", () => {
		const scope = new ActiveScope();
		scope.save([1, 2, 3]);
		scope.save([5]);

		expect(scope.has(1)).toBe(false);
		expect(scope.has(5)).toBe(true);
		expect(scope.size).toBe(1);
	});

	test("should admit nothing after saving an empty snapshot", () => {
		const scope = new ActiveScope();
		scope.save([]);

		expect(scope.isActive).toBe(true);
		expect(scope.has(0)).toBe(false);
	});

	test("should go back to unrestricted when cleared", () => {
		const scope = new ActiveScope();
		scope.save([3]);
		scope.clear();

		expect(scope.isActive).toBe(false);
		expect(scope.has(0)).toBe(true);
	});

	test("should not alias the iterable it was saved from", () => {
		const source = [3, 1];
		const scope = new ActiveScope();
		scope.save(source);
		source.push(8);

		expect(scope.has(8)).toBe(false);
		expect(scope.size).toBe(2);
	});
});
