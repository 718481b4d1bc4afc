import { ItemList, type ItemListOptions, type ListItem } from "./item-list";
import { Picker, type PickerOptions } from "./picker";
import { prompt } from "./runner";
import type { RunIO } from "./terminal";
import { TextArea, type TextAreaOptions } from "./text-area";
import { TextInput, type TextInputOptions } from "./text-input";

// One-call helpers. Each resolves with the confirmed value and rejects with
// CanceledError, QuitError or the loop failure; check with isCanceled/isQuit.

export interface PickOptions extends PickerOptions {
    /** Default ["yes", "no"]. */
    items?: string[];
}

/** Resolves with the picked index. */
export async function pick(options: PickOptions = {}, io?: RunIO): Promise<number> {
    const items = options.items && options.items.length > 0 ? options.items : ["yes", "no"];
    const picker = new Picker(items, options);
    await prompt(picker, io);
    return picker.selectedIndex();
}

export async function selectItem(
    items: readonly ListItem[],
    options: ItemListOptions = {},
    io?: RunIO,
): Promise<ListItem | undefined> {
    return prompt(new ItemList(items, options), io);
}

export async function input(value = "", options: TextInputOptions = {}, io?: RunIO): Promise<string> {
    return prompt(new TextInput(value, options), io);
}

export async function textarea(value = "", options: TextAreaOptions = {}, io?: RunIO): Promise<string> {
    return prompt(new TextArea(value, options), io);
}
