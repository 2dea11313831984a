import blessed from "blessed";
import { basename } from "node:path";
import { MIN_SCREEN_WIDTH_FOR_PREVIEW, previewWindow, type FilePicker } from "./file-picker.js";
import { defaultKeymap, resolveKey, type Keymap } from "./keymap.js";
import type { PickerOutcome } from "./types.js";

export interface PickerViewOptions<T> {
	picker: FilePicker<T>;
	title?: string;
	preview?: boolean;
	keymap?: Keymap;
}

/**
 * Terminal host for a picker. blessed owns the screen, the search box and the
 * render loop; every key either maps to a picker command or edits the query.
 */
export class PickerView<T> {
	private readonly picker: FilePicker<T>;
	private readonly keymap: Keymap;
	private readonly previewEnabled: boolean;
	private screen: blessed.Widgets.Screen;
	private searchBox: blessed.Widgets.TextboxElement;
	private resultsList: blessed.Widgets.ListElement;
	private previewBox: blessed.Widgets.BoxElement;
	private statusBar: blessed.Widgets.BoxElement;
	private lastQuery = "";
	private closed = false;

	constructor(options: PickerViewOptions<T>) {
		this.picker = options.picker;
		this.keymap = options.keymap ?? defaultKeymap;
		this.previewEnabled = options.preview ?? true;

		this.screen = blessed.screen({
			smartCSR: true,
			title: options.title ?? "winnow",
		});

		this.searchBox = blessed.textbox({
			parent: this.screen,
			top: 0,
			left: 0,
			width: "100%",
			height: 3,
			border: {
				type: "line",
			},
			style: {
				border: {
					fg: "cyan",
				},
			},
			label: " Query ",
			inputOnFocus: true,
		});

		this.resultsList = blessed.list({
			parent: this.screen,
			top: 3,
			left: 0,
			width: "100%",
			height: "100%-4",
			border: {
				type: "line",
			},
			style: {
				border: {
					fg: "white",
				},
				selected: {
					bg: "blue",
					fg: "white",
				},
			},
			label: " Candidates ",
		});

		this.previewBox = blessed.box({
			parent: this.screen,
			top: 3,
			left: "50%",
			width: "50%",
			height: "100%-4",
			border: {
				type: "line",
			},
			style: {
				border: {
					fg: "white",
				},
			},
			label: " Preview ",
		});

		this.statusBar = blessed.box({
			parent: this.screen,
			bottom: 0,
			left: 0,
			width: "100%",
			height: 1,
			style: {
				bg: "blue",
				fg: "white",
			},
		});

		this.setupEventHandlers();
		this.render();
	}

	private setupEventHandlers(): void {
		this.searchBox.key([...this.keymap.keys()], (_ch, key) => {
			this.handleKey(key.full);
		});

		// blessed updates the value after keypress listeners run
		this.searchBox.on("keypress", () => {
			setTimeout(() => this.syncQuery(), 10);
		});

		this.screen.on("resize", () => this.render());
	}

	/** Runs the command bound to `name`. Returns `undefined` for unbound keys. */
	handleKey(name: string): PickerOutcome | undefined {
		if (this.closed) return undefined;

		// Keys can arrive before the deferred sync has seen the latest query
		this.syncQuery();

		const command = resolveKey(this.keymap, name);
		if (!command) return undefined;

		const outcome = this.picker.handle(command);
		if (outcome === "closed") {
			this.close();
			return outcome;
		}

		// Saving or clearing the scope empties the query
		if (command.type === "save-scope" || command.type === "reset") {
			this.searchBox.clearValue();
			this.lastQuery = "";
		}

		this.render();
		return outcome;
	}

	syncQuery(): void {
		if (this.closed) return;

		const value = this.searchBox.getValue();
		if (value === this.lastQuery) return;

		this.lastQuery = value;
		this.picker.handle({ type: "query", text: value });
		this.render();
	}

	render(): void {
		const showPreview = this.previewEnabled && dimension(this.screen.width, 0) > MIN_SCREEN_WIDTH_FOR_PREVIEW;
		this.resultsList.width = showPreview ? "50%" : "100%";
		if (showPreview) {
			this.previewBox.show();
		} else {
			this.previewBox.hide();
		}

		this.picker.setRows(dimension(this.resultsList.height, 3) - 2);
		const window = this.picker.visible();

		this.resultsList.setItems(
			window.entries.map((entry, index) => `${index === window.selected ? "❯ " : "  "}${entry.text}`),
		);
		if (window.selected >= 0) {
			this.resultsList.select(window.selected);
		}

		if (showPreview) {
			this.renderPreview();
		}
		this.renderStatus();
		this.screen.render();
	}

	private renderPreview(): void {
		const preview = this.picker.preview();
		if (!preview) {
			this.previewBox.setLabel(" Preview ");
			this.previewBox.setContent("");
			return;
		}

		const { location, result } = preview;
		this.previewBox.setLabel(` ${basename(location.path)} `);

		switch (result.status) {
			case "loaded": {
				const height = dimension(this.previewBox.height, 3) - 2;
				const { firstLine, lines, highlight } = previewWindow(result.document.text, location.line, height);
				const width = String(firstLine + lines.length).length;

				this.previewBox.setContent(
					lines
						.map((text, index) => {
							const marker = index === highlight ? ">" : " ";
							const number = String(firstLine + index + 1).padStart(width);
							return `${marker}${number} ${text.replace(/\t/g, "    ")}`;
						})
						.join("\n"),
				);
				if (result.origin === "live") {
					this.previewBox.setLabel(` ${basename(location.path)} [open] `);
				}
				break;
			}
			case "unavailable":
				this.previewBox.setContent(`Preview unavailable: ${result.reason}`);
				break;
			case "pending":
				this.previewBox.setContent("Loading…");
				break;
		}
	}

	private renderStatus(): void {
		const matches = this.picker.matches.length;
		const selected = matches > 0 ? ` | Selected: ${this.picker.cursorPosition + 1}/${matches}` : "";
		const scopeSize = this.picker.scopeSize;
		const scope = scopeSize === undefined ? "" : ` | Scope: ${scopeSize}`;

		this.statusBar.setContent(
			`${this.picker.total} candidates | ${matches} results${selected}${scope} | Enter: open | C-s/C-v: split | C-space/C-\`: save scope | C-r: reset | Esc: exit`,
		);
	}

	private close(): void {
		this.closed = true;
		this.screen.destroy();
	}

	async start(): Promise<void> {
		this.searchBox.focus();
		this.screen.render();

		return new Promise((resolve) => {
			this.screen.on("destroy", resolve);
		});
	}
}

function dimension(value: number | string, fallback: number): number {
	return typeof value === "number" ? value : fallback;
}
