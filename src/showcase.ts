import chalk from "chalk";
import { QuitError } from "./errors";
import { ItemList, listItem } from "./item-list";
import type { Outcome } from "./outcome";
import { Picker } from "./picker";
import { run } from "./runner";
import type { RunIO } from "./terminal";
import { TextArea } from "./text-area";
import { TextInput } from "./text-input";
import type { IModel } from "./widget";

export type ShowcaseName = "list" | "pick" | "input" | "textarea";

export const SHOWCASES: readonly ShowcaseName[] = ["list", "textarea", "input", "pick"];

export interface ShowcaseContext {
    write: (text: string) => void;
    /** Fresh I/O for each widget run; the terminal when omitted. */
    io?: () => RunIO;
}

const FRUIT = ["Apple", "Banana", "Cherry"];

/**
 * Run one widget and print how it finished. A quit stops the whole showcase
 * by throwing QuitError.
 */
async function handle<V>(
    ctx: ShowcaseContext,
    widget: IModel<V>,
    describe: (value: V) => string,
): Promise<Outcome<V>> {
    const outcome = await run(widget, ctx.io?.());
    switch (outcome.kind) {
        case "quit":
            ctx.write("Quit\n");
            throw new QuitError();
        case "canceled":
            ctx.write("Canceled\n");
            break;
        case "confirmed":
            ctx.write(describe(outcome.value) + "\n");
            break;
    }
    return outcome;
}

async function listShowcase(ctx: ShowcaseContext): Promise<void> {
    ctx.write(chalk.bold("=== List Showcase ===\n"));
    ctx.write("\nDefault List (Use arrow keys to navigate, / to filter, Enter to select):\n");
    const list = new ItemList([
        listItem("Apple", "A sweet red fruit"),
        listItem("Banana", "A long yellow fruit"),
        listItem("Cherry", "A small red fruit"),
    ]);
    await handle(ctx, list, (item) => `Selected item: ${item?.title ?? ""}`);
}

async function pickShowcase(ctx: ShowcaseContext): Promise<void> {
    ctx.write(chalk.bold("=== Picker Showcase ===\n"));

    ctx.write("\nDefault Style List (Use arrow keys to navigate, Enter to select):\n");
    const byDefault = new Picker(FRUIT, { label: "Default Style List" });
    await handle(ctx, byDefault, (item) => `Picked item: ${item} (Index: ${byDefault.selectedIndex()})`);

    ctx.write("\nHorizontal List with Custom Colors (Use arrow keys to navigate, Enter to select):\n");
    const horizontal = new Picker(FRUIT, {
        label: "Horizontal List",
        horizontal: true,
        styles: {
            label: (text) => chalk.hex("#FF69B4")(text),
            selected: (text) => chalk.hex("#FF4500")(text),
            normal: (text) => chalk.hex("#98FB98")(text),
        },
    });
    await handle(ctx, horizontal, (item) => `Picked item: ${item} (Index: ${horizontal.selectedIndex()})`);

    ctx.write("\nCustom Format List:\n");
    const formatted = new Picker(FRUIT, {
        label: "Custom Format List",
        selectedFormat: "► %s ◄",
        normalFormat: "  %s  ",
    });
    await handle(ctx, formatted, (item) => `Picked item: ${item} (Index: ${formatted.selectedIndex()})`);
}

async function inputShowcase(ctx: ShowcaseContext): Promise<void> {
    ctx.write(chalk.bold("=== Input Showcase ===\n"));
    ctx.write("\nDefault Style Input (Type to see suggestions, Enter to select):\n");
    const field = new TextInput("", {
        prompt: "Default Style Input: ",
        suggestions: ["Apple", "Aardvark", "Banana", "Cherry", "Date", "Elderberry", "Fig", "Grape"],
    });
    await handle(ctx, field, (value) => `Final input: ${value}`);
}

async function textareaShowcase(ctx: ShowcaseContext): Promise<void> {
    ctx.write(chalk.bold("=== Textarea Showcase ===\n"));
    ctx.write("\nMulti-line Input (Enter on a blank line to finish):\n");
    const area = new TextArea("", { placeholder: "Write something..." });
    await handle(ctx, area, (value) => `Final textarea: ${value}`);
}

const RUNNERS: Record<ShowcaseName, (ctx: ShowcaseContext) => Promise<void>> = {
    list: listShowcase,
    pick: pickShowcase,
    input: inputShowcase,
    textarea: textareaShowcase,
};

export function isShowcaseName(name: string): name is ShowcaseName {
    return SHOWCASES.some((s) => s === name);
}

/** Run the named showcases in order; all of them when `names` is empty. */
export async function showcase(ctx: ShowcaseContext, names: readonly ShowcaseName[] = []): Promise<void> {
    for (const name of names.length > 0 ? names : SHOWCASES) {
        await RUNNERS[name](ctx);
    }
}
