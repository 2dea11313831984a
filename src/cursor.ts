/**
 * Bounded position in the ranked view. The cursor never wraps: it stays at 0
 * on an empty view and is clamped to the last entry otherwise.
 */
export class SelectionCursor {
	private cursor = 0;

	get position(): number {
		return this.cursor;
	}

	reset(): void {
		this.cursor = 0;
	}

	moveUp(): void {
		this.cursor = Math.max(this.cursor - 1, 0);
	}

	moveDown(length: number): void {
		if (length === 0) return;
		this.cursor = Math.min(this.cursor + 1, length - 1);
	}

	pageUp(rows: number): void {
		this.cursor = Math.max(this.cursor - Math.max(rows, 1), 0);
	}

	pageDown(length: number, rows: number): void {
		if (length === 0) return;
		this.cursor = Math.min(this.cursor + Math.max(rows, 1), length - 1);
	}
}
