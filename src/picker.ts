import { SelectionCursor } from "./cursor.js";
import { FilterEngine } from "./filter-engine.js";
import { ActiveScope } from "./scope.js";
import { createFuseScorer } from "./scorer.js";
import type {
	ActionDispatcher,
	DisplayFormatter,
	MatchResult,
	PickerAction,
	PickerCommand,
	PickerOutcome,
	ScoringFunction,
} from "./types.js";
import { pageWindow } from "./windowing.js";

export const DEFAULT_ROWS = 10;

export interface PickerOptions<T> {
	items: readonly T[];
	format: DisplayFormatter<T>;
	dispatch: ActionDispatcher<T>;
	/** Defaults to the fuse.js scorer. */
	scorer?: ScoringFunction;
	/** Visible row budget used for windowing and page moves. */
	rows?: number;
}

export interface PickerEntry<T> {
	item: T;
	text: string;
	match: MatchResult;
}

export interface PickerWindow<T> {
	offset: number;
	/** Cursor position relative to `offset`, or -1 when nothing is visible. */
	selected: number;
	entries: PickerEntry<T>[];
}

export class Picker<T> {
	private readonly engine: FilterEngine<T>;
	private readonly cursor = new SelectionCursor();
	private readonly scope = new ActiveScope();
	private readonly format: DisplayFormatter<T>;
	private readonly dispatch: ActionDispatcher<T>;
	private query = "";
	private rows: number;

	constructor(options: PickerOptions<T>) {
		this.format = options.format;
		this.dispatch = options.dispatch;
		this.rows = Math.max(Math.floor(options.rows ?? DEFAULT_ROWS), 1);
		this.engine = new FilterEngine(options.items, options.format, options.scorer ?? createFuseScorer());

		this.rescan();
	}

	get pattern(): string {
		return this.query;
	}

	get total(): number {
		return this.engine.size;
	}

	get matches(): readonly MatchResult[] {
		return this.engine.view;
	}

	get cursorPosition(): number {
		return this.cursor.position;
	}

	/** Number of candidates in the saved scope, `undefined` when unrestricted. */
	get scopeSize(): number | undefined {
		return this.scope.size;
	}

	get rowBudget(): number {
		return this.rows;
	}

	setRows(rows: number): void {
		this.rows = Math.max(Math.floor(rows), 1);
	}

	rescan(): void {
		this.engine.rescan(this.query, this.scope);
		this.cursor.reset();
	}

	/** Updates the query and rescans only when the text actually changed. */
	setQuery(text: string): boolean {
		if (text === this.query) return false;

		this.query = text;
		this.rescan();
		return true;
	}

	moveUp(): void {
		this.cursor.moveUp();
	}

	moveDown(): void {
		this.cursor.moveDown(this.engine.view.length);
	}

	pageUp(): void {
		this.cursor.pageUp(this.rows);
	}

	pageDown(): void {
		this.cursor.pageDown(this.engine.view.length, this.rows);
	}

	selection(): T | undefined {
		const match = this.engine.view[this.cursor.position];
		return match ? this.engine.candidate(match.index) : undefined;
	}

	/**
	 * Narrows the universe to the current matches and starts over with an
	 * empty query inside that scope.
	 */
	saveScope(): void {
		this.scope.save(this.engine.view.map((match) => match.index));
		this.query = "";
		this.rescan();
	}

	reset(): void {
		this.scope.clear();
		this.query = "";
		this.rescan();
	}

	/** Dispatches the selection if there is one. Always closes the picker. */
	confirm(action: PickerAction): PickerOutcome {
		const selected = this.selection();
		if (selected !== undefined) {
			this.dispatch(selected, action);
		}
		return "closed";
	}

	handle(command: PickerCommand): PickerOutcome {
		switch (command.type) {
			case "move-up":
				this.moveUp();
				break;
			case "move-down":
				this.moveDown();
				break;
			case "page-up":
				this.pageUp();
				break;
			case "page-down":
				this.pageDown();
				break;
			case "confirm":
				return this.confirm(command.action);
			case "cancel":
				return "closed";
			case "save-scope":
				this.saveScope();
				break;
			case "reset":
				this.reset();
				break;
			case "query":
				this.setQuery(command.text);
				break;
		}

		return "consumed";
	}

	visible(): PickerWindow<T> {
		const view = this.engine.view;
		const { offset, end } = pageWindow(this.cursor.position, this.rows, view.length);
		const entries: PickerEntry<T>[] = [];

		for (const match of view.slice(offset, end)) {
			const item = this.engine.candidate(match.index);
			if (item === undefined) continue;
			entries.push({ item, text: this.format(item), match });
		}

		return {
			offset,
			selected: entries.length > 0 ? this.cursor.position - offset : -1,
			entries,
		};
	}
}
