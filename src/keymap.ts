import type { PickerCommand } from "./types.js";

export type Keymap = ReadonlyMap<string, PickerCommand>;

const moveUp: PickerCommand = { type: "move-up" };
const moveDown: PickerCommand = { type: "move-down" };
const cancel: PickerCommand = { type: "cancel" };
const open: PickerCommand = { type: "confirm", action: "open" };
const saveScope: PickerCommand = { type: "save-scope" };

/**
 * Key names follow blessed's `key.full` notation. Keys that are not bound here
 * go to the query editor. Tab is left unbound because the search box inserts
 * it into the query. Terminals send Ctrl+Space as NUL, which blessed names
 * `C-\``.
 */
export const defaultKeymap: Keymap = new Map<string, PickerCommand>([
	["up", moveUp],
	["C-p", moveUp],
	["down", moveDown],
	["C-n", moveDown],
	["pageup", { type: "page-up" }],
	["pagedown", { type: "page-down" }],
	["enter", open],
	["return", open],
	["C-o", { type: "confirm", action: "replace" }],
	["C-s", { type: "confirm", action: "horizontal-split" }],
	["C-v", { type: "confirm", action: "vertical-split" }],
	["C-`", saveScope],
	["C-space", saveScope],
	["C-r", { type: "reset" }],
	["escape", cancel],
	["C-c", cancel],
]);

export function resolveKey(keymap: Keymap, name: string | undefined): PickerCommand | undefined {
	return name === undefined ? undefined : keymap.get(name);
}
