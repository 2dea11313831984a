export interface PageWindow {
	/** Index of the first visible row; always a multiple of the row budget. */
	offset: number;
	/** Exclusive end of the visible rows, clamped to the view length. */
	end: number;
	rows: number;
}

/**
 * Page-jump windowing: the window advances a full row budget at a time
 * instead of scrolling one row per cursor move.
 */
export function pageWindow(cursor: number, rows: number, length: number): PageWindow {
	const budget = Math.max(Math.floor(rows), 1);
	const offset = Math.floor(cursor / budget) * budget;

	return {
		offset,
		end: Math.min(offset + budget, length),
		rows: budget,
	};
}
