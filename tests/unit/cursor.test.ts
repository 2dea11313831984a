import { describe, test, expect, beforeEach } from "vitest";
import { SelectionCursor } from "../../src/cursor.js";

describe("SelectionCursor", () => {
	let cursor: SelectionCursor;

	beforeEach(() => {
		cursor = new SelectionCursor();
	});

	test("should start at zero", () => {
		expect(cursor.position).toBe(0);
	});

	test("should not move above the first entry", () => {
		cursor.moveUp();

		expect(cursor.position).toBe(0);
	});

	test("should not move past the last entry", () => {
		cursor.moveDown(2);
		cursor.moveDown(2);
		cursor.moveDown(2);

		expect(cursor.position).toBe(1);
	});

	test("should ignore move down on an empty view", () => {
		cursor.moveDown(0);

		expect(cursor.position).toBe(0);
	});

	test("should move back up after moving down", () => {
		cursor.moveDown(5);
		cursor.moveDown(5);
		cursor.moveUp();

		expect(cursor.position).toBe(1);
	});

	test("should page by the row budget and clamp at both ends", () => {
		cursor.pageDown(12, 5);
		expect(cursor.position).toBe(5);

		cursor.pageDown(12, 5);
		cursor.pageDown(12, 5);
		expect(cursor.position).toBe(11);

		cursor.pageUp(5);
		expect(cursor.position).toBe(6);

		cursor.pageUp(5);
		cursor.pageUp(5);
		expect(cursor.position).toBe(0);
	});

	test("should ignore page down on an empty view", () => {
		cursor.pageDown(0, 5);

		expect(cursor.position).toBe(0);
	});

	test("should reset to zero", () => {
		cursor.moveDown(3);
		cursor.reset();

		expect(cursor.position).toBe(0);
	});
});
