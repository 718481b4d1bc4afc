#!/usr/bin/env node

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "./config";
import { ConfigError, isCanceled, isQuit } from "./errors";
import { listItem, type ListItem } from "./item-list";
import { getLogger } from "./logger";
import { input, pick, selectItem, textarea } from "./prompts";
import { isShowcaseName, SHOWCASES, showcase } from "./showcase";

const EXIT_CANCELED = 1;
const EXIT_FAILED = 2;
const EXIT_QUIT = 130;

function parseInteger(value: string): number {
    const n = Number.parseInt(value, 10);
    if (Number.isNaN(n)) throw new InvalidArgumentError("Not a number.");
    return n;
}

/** "title:description" → list item; the description is optional. */
export function parseListItem(arg: string): ListItem {
    const at = arg.indexOf(":");
    if (at < 0) return listItem(arg);
    return listItem(arg.slice(0, at), arg.slice(at + 1));
}

const out = (text: string) => {
    process.stdout.write(text);
};

export function buildProgram(): Command {
    const program = new Command();

    program
        .name("termpick")
        .description("Interactive terminal pickers, lists and text fields.");

    program
        .command("showcase")
        .description(`Try the widgets (${SHOWCASES.join(", ")})`)
        .argument("[widgets...]", "widgets to show, all by default")
        .action(async (widgets: string[]) => {
            const unknown = widgets.filter((w) => !isShowcaseName(w));
            if (unknown.length > 0) {
                throw new InvalidArgumentError(`Unknown widget: ${unknown.join(", ")}`);
            }
            await showcase({ write: out }, widgets.filter(isShowcaseName));
        });

    program
        .command("pick")
        .description("Pick one item and print it")
        .argument("[items...]", "items to choose from", [])
        .option("-l, --label <label>", "label shown before the items", "")
        .option("-i, --index <n>", "initially selected index", parseInteger, 0)
        .option("--horizontal", "lay the items out on one line", false)
        .option("--no-cancel", "ignore esc")
        .option("--no-quit", "ignore ctrl+c")
        .action(async (items: string[], opts: { label: string; index: number; horizontal: boolean; cancel: boolean; quit: boolean }) => {
            const choices = items.length > 0 ? items : ["yes", "no"];
            const idx = await pick({
                items: choices,
                label: opts.label,
                selectedIndex: opts.index,
                horizontal: opts.horizontal,
                cancelable: opts.cancel,
                quitable: opts.quit,
            });
            out(`${choices[idx] ?? ""}\n`);
        });

    program
        .command("list")
        .description("Choose from a list of title:description items and print the title")
        .argument("<items...>", "items as title:description")
        .option("-t, --title <title>", "list title")
        .option("--no-cancel", "ignore esc")
        .option("--no-quit", "ignore ctrl+c")
        .action(async (items: string[], opts: { title?: string; cancel: boolean; quit: boolean }) => {
            const item = await selectItem(items.map(parseListItem), {
                title: opts.title,
                cancelable: opts.cancel,
                quitable: opts.quit,
            });
            out(`${item?.title ?? ""}\n`);
        });

    program
        .command("input")
        .description("Read one line of text and print it")
        .option("-p, --prompt <prompt>", "prompt before the field", "> ")
        .option("-v, --value <value>", "initial text", "")
        .option("--placeholder <text>", "shown while the field is empty", "")
        .option("-s, --suggest <words...>", "autocomplete suggestions", [])
        .option("--char-limit <n>", "maximum characters", parseInteger, 100)
        .option("--width <n>", "visible width", parseInteger, 40)
        .option("--no-cancel", "ignore esc")
        .option("--no-quit", "ignore ctrl+c")
        .action(
            async (opts: {
                prompt: string;
                value: string;
                placeholder: string;
                suggest: string[];
                charLimit: number;
                width: number;
                cancel: boolean;
                quit: boolean;
            }) => {
                const value = await input(opts.value, {
                    prompt: opts.prompt,
                    placeholder: opts.placeholder,
                    suggestions: opts.suggest,
                    charLimit: opts.charLimit,
                    width: opts.width,
                    cancelable: opts.cancel,
                    quitable: opts.quit,
                });
                out(`${value}\n`);
            },
        );

    program
        .command("textarea")
        .description("Read several lines of text and print them")
        .option("-p, --prompt <prompt>", "prompt before each line", "")
        .option("-v, --value <value>", "initial text", "")
        .option("--placeholder <text>", "shown while the area is empty", "")
        .option("--char-limit <n>", "maximum characters", parseInteger, 100)
        .option("--max-width <n>", "box width", parseInteger, 40)
        .option("--max-height <n>", "box height and line limit", parseInteger, 10)
        .option("--no-line-numbers", "hide line numbers")
        .option("--no-cancel", "ignore esc")
        .option("--no-quit", "ignore ctrl+c")
        .action(
            async (opts: {
                prompt: string;
                value: string;
                placeholder: string;
                charLimit: number;
                maxWidth: number;
                maxHeight: number;
                lineNumbers: boolean;
                cancel: boolean;
                quit: boolean;
            }) => {
                const value = await textarea(opts.value, {
                    prompt: opts.prompt,
                    placeholder: opts.placeholder,
                    charLimit: opts.charLimit,
                    maxWidth: opts.maxWidth,
                    maxHeight: opts.maxHeight,
                    showLineNumbers: opts.lineNumbers,
                    cancelable: opts.cancel,
                    quitable: opts.quit,
                });
                out(value.endsWith("\n") ? value : `${value}\n`);
            },
        );

    return program;
}

async function main(): Promise<void> {
    try {
        loadConfig();
        await buildProgram().parseAsync(process.argv);
    } catch (error) {
        if (isQuit(error)) {
            process.stderr.write("Quit\n");
            process.exit(EXIT_QUIT);
        }
        if (isCanceled(error)) {
            process.stderr.write("Canceled\n");
            process.exitCode = EXIT_CANCELED;
            return;
        }

        const message = error instanceof Error ? error.message : String(error);
        if (!(error instanceof ConfigError)) {
            getLogger().error("command failed", { error: message });
        }
        process.stderr.write(chalk.red(`Error: ${message}\n`));
        process.exitCode = EXIT_FAILED;
    }
}

if (require.main === module) {
    void main();
}
