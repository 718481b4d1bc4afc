import chalk from "chalk";
import type { Style } from "./widget";

export interface KeyBinding {
    key: string;
    description: string;
}

export interface HelpStyles {
    key: Style;
    description: Style;
    separator: Style;
}

export const defaultHelpStyles = (): HelpStyles => ({
    key: (text) => chalk.gray(text),
    description: (text) => chalk.keyword("dimgray")(text),
    separator: (text) => chalk.keyword("dimgray")(text),
});

const KEY_SYMBOLS: Record<string, string> = {
    backspace: "⌫",
    ctrl: "⌃",
    shift: "⇧",
    alt: "⌥",
    enter: "↵",
    esc: "⎋",
    tab: "⇥",
    space: "␣",
    up: "↑",
    down: "↓",
    left: "←",
    right: "→",
};

/** "ctrl+n" → "⌃n", "esc" → "⎋"; unknown parts are kept as written. */
export function keySymbol(key: string): string {
    return key
        .split("+")
        .map((part) => KEY_SYMBOLS[part.toLowerCase()] ?? part)
        .join("");
}

export interface HelpOptions {
    styles?: HelpStyles;
    /** Draw keys as symbols (⎋, ↵, ⌃) instead of names. */
    symbols?: boolean;
}

/** One-line key help: `tab complete • esc cancel`. */
export function renderHelp(bindings: KeyBinding[], options: HelpOptions = {}): string {
    const styles = options.styles ?? defaultHelpStyles();
    return bindings
        .map((b) => {
            const key = options.symbols ? keySymbol(b.key) : b.key;
            return `${styles.key(key)} ${styles.description(b.description)}`;
        })
        .join(styles.separator(" • "));
}

/** esc/ctrl+c bindings for the controls a widget actually honours. */
export function controlBindings(cancelable: boolean, quitable: boolean): KeyBinding[] {
    const out: KeyBinding[] = [];
    if (cancelable) out.push({ key: "esc", description: "cancel" });
    if (quitable) out.push({ key: "ctrl+c", description: "quit" });
    return out;
}
