import type * as readline from "readline";

// ══════════════════════════════════════════════════════════════════════════════
//  MESSAGES
// ══════════════════════════════════════════════════════════════════════════════

/** A single named key, e.g. "enter", "esc", "ctrl+c", "up", "a", "A", " ". */
export interface KeyMsg {
    type: "key";
    key: string;
}

/** Terminal size change, in character cells. */
export interface ResizeMsg {
    type: "resize";
    columns: number;
    rows: number;
}

export type Msg = KeyMsg | ResizeMsg;

export function keyMsg(key: string): KeyMsg {
    return { type: "key", key };
}

export function resizeMsg(columns: number, rows: number): ResizeMsg {
    return { type: "resize", columns, rows };
}

// ══════════════════════════════════════════════════════════════════════════════
//  KEYPRESS → NAME
// ══════════════════════════════════════════════════════════════════════════════

const RENAMED: Record<string, string> = {
    return: "enter",
    enter: "enter",
    escape: "esc",
    space: " ",
};

/**
 * Printable single character (a letter, digit, symbol or space), as opposed
 * to a named key like "enter" or a chord like "ctrl+a".
 */
export function isPrintable(key: string): boolean {
    const chars = [...key];
    if (chars.length !== 1) return false;
    const code = key.codePointAt(0) ?? 0;
    return code >= 0x20 && code !== 0x7f;
}

/**
 * Name a keypress the way widgets match on it. `str` is the raw character
 * readline saw; `key` is missing for characters readline cannot decode.
 */
export function keyName(str: string | undefined, key: readline.Key | undefined): string {
    const name = key?.name;

    if (name && name in RENAMED && !key?.ctrl) return RENAMED[name] ?? name;
    if (name && key?.ctrl) return `ctrl+${name}`;
    if (name && key?.meta) return `alt+${name}`;
    if (name === "tab" && key?.shift) return "shift+tab";

    const seq = key?.sequence ?? str ?? "";
    if (isPrintable(seq)) return seq;
    return name ?? seq;
}
