import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { LineEditor, MultilineEditor, ScrollState } from "../editing";

function type(editor: { handleKey(key: string): boolean }, ...keys: string[]): void {
    for (const key of keys) editor.handleKey(key);
}

describe("LineEditor", () => {
    test("inserts at the cursor", () => {
        const e = new LineEditor();
        type(e, "a", "b", "c", "left", "X");
        assert.equal(e.value(), "abXc");
        assert.equal(e.cursor(), 3);
    });

    test("backspace and delete", () => {
        const e = new LineEditor("abc");
        type(e, "backspace");
        assert.equal(e.value(), "ab");
        type(e, "home", "delete");
        assert.equal(e.value(), "b");
    });

    test("ctrl+u and ctrl+k cut around the cursor", () => {
        const u = new LineEditor("hello");
        type(u, "left", "left", "ctrl+u");
        assert.equal(u.value(), "lo");
        assert.equal(u.cursor(), 0);

        const k = new LineEditor("hello");
        type(k, "home", "right", "ctrl+k");
        assert.equal(k.value(), "h");
    });

    test("moves and deletes whole characters outside the BMP", () => {
        const e = new LineEditor("a😀b");
        type(e, "left", "left");
        assert.equal(e.cursor(), 1);
        type(e, "delete");
        assert.equal(e.value(), "ab");

        const back = new LineEditor("a😀");
        type(back, "backspace");
        assert.equal(back.value(), "a");
    });

    test("counts the char limit in characters", () => {
        assert.equal(new LineEditor("😀😀😀", { charLimit: 2 }).value(), "😀😀");
        const e = new LineEditor("😀", { charLimit: 2 });
        type(e, "😀", "x");
        assert.equal(e.value(), "😀😀");
    });

    test("respects the char limit", () => {
        const e = new LineEditor("ab", { charLimit: 3 });
        type(e, "c", "d");
        assert.equal(e.value(), "abc");
        e.setValue("abcdef");
        assert.equal(e.value(), "abc");
    });

    test("reports keys it does not handle", () => {
        const e = new LineEditor();
        assert.equal(e.handleKey("enter"), false);
        assert.equal(e.handleKey("f1"), false);
        assert.equal(e.handleKey("z"), true);
    });

    test("matches suggestions by prefix, ignoring case", () => {
        const e = new LineEditor("", { suggestions: ["Apple", "Aardvark", "Banana"] });
        assert.equal(e.currentSuggestion(), undefined);

        type(e, "a");
        assert.deepEqual(e.matchedSuggestions(), ["Apple", "Aardvark"]);
        assert.equal(e.currentSuggestion(), "Apple");

        type(e, "backspace", "B");
        assert.deepEqual(e.matchedSuggestions(), ["Banana"]);
    });

    test("cycles and completes suggestions", () => {
        const e = new LineEditor("a", { suggestions: ["Apple", "Aardvark"] });
        type(e, "ctrl+n");
        assert.equal(e.currentSuggestion(), "Aardvark");
        type(e, "ctrl+n");
        assert.equal(e.currentSuggestion(), "Apple");
        type(e, "ctrl+p");
        assert.equal(e.currentSuggestion(), "Aardvark");

        type(e, "tab");
        assert.equal(e.value(), "Aardvark");
        assert.equal(e.cursor(), 8);
    });

    test("scrolls horizontally to keep the cursor visible", () => {
        const e = new LineEditor("", { width: 3 });
        type(e, "a", "b", "c", "d");
        assert.equal(e.scrollX(), 2);
        type(e, "home");
        assert.equal(e.scrollX(), 0);
    });
});

describe("MultilineEditor", () => {
    test("starts with the cursor at the end", () => {
        const e = new MultilineEditor("ab\ncd");
        assert.equal(e.cursorRow(), 1);
        assert.equal(e.cursorCol(), 2);
        assert.deepEqual(e.lines(), ["ab", "cd"]);
    });

    test("splits and joins lines", () => {
        const e = new MultilineEditor("abcd");
        type(e, "left", "left", "enter");
        assert.equal(e.value(), "ab\ncd");
        assert.equal(e.cursorRow(), 1);
        assert.equal(e.cursorCol(), 0);

        type(e, "backspace");
        assert.equal(e.value(), "abcd");
        assert.equal(e.cursorCol(), 2);
    });

    test("delete at the end of a line pulls up the next", () => {
        const e = new MultilineEditor("a\nb");
        type(e, "up", "delete");
        assert.equal(e.value(), "ab");
    });

    test("vertical moves clamp the column", () => {
        const e = new MultilineEditor("long\nx");
        type(e, "up");
        assert.equal(e.cursorCol(), 1);
        type(e, "end", "down");
        assert.equal(e.cursorRow(), 1);
        assert.equal(e.cursorCol(), 1);
    });

    test("refuses lines past the height limit", () => {
        const e = new MultilineEditor("a\nb", { maxHeight: 2 });
        type(e, "enter");
        assert.equal(e.value(), "a\nb");
    });

    test("never leaves the cursor inside a surrogate pair", () => {
        const e = new MultilineEditor("😀\nabc");
        type(e, "left", "left", "up");
        assert.equal(e.cursorRow(), 0);
        assert.equal(e.cursorCol(), 0);
        type(e, "x");
        assert.equal(e.value(), "x😀\nabc");
        type(e, "right", "backspace");
        assert.equal(e.value(), "x\nabc");
        assert.equal(e.cursorCol(), 1);
    });

    test("setValue drops lines past the height limit, then characters past the char limit", () => {
        assert.equal(new MultilineEditor("a\nb\nc", { maxHeight: 2 }).value(), "a\nb");
        assert.equal(new MultilineEditor("ab\ncd", { charLimit: 4 }).value(), "ab\nc");
        assert.equal(new MultilineEditor("a\nbc\nd", { maxHeight: 2, charLimit: 3 }).value(), "a\nb");
    });

    test("counts newlines against the char limit", () => {
        const e = new MultilineEditor("ab", { charLimit: 3 });
        type(e, "c", "d", "enter");
        assert.equal(e.value(), "abc");
    });
});

describe("ScrollState", () => {
    test("clamps vertical scroll to the content", () => {
        const s = new ScrollState();
        s.clampVertical(5, 3, 4);
        assert.equal(s.y, 3);
        s.clampVertical(9, 3, 4);
        assert.equal(s.y, 4);
        s.clampVertical(0, 3, 4);
        assert.equal(s.y, 0);
    });
});
