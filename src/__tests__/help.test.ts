import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { controlBindings, keySymbol, renderHelp } from "../help";
import { plainHelp } from "./helpers";

describe("renderHelp", () => {
    const bindings = [
        { key: "tab", description: "complete" },
        { key: "esc", description: "cancel" },
    ];

    test("joins key/description pairs", () => {
        assert.equal(renderHelp(bindings, { styles: plainHelp }), "tab complete • esc cancel");
    });

    test("can draw keys as symbols", () => {
        assert.equal(renderHelp(bindings, { styles: plainHelp, symbols: true }), "⇥ complete • ⎋ cancel");
    });

    test("applies the styles", () => {
        const styled = renderHelp([{ key: "esc", description: "cancel" }], {
            styles: { key: (t) => `<${t}>`, description: (t) => `(${t})`, separator: (t) => t },
        });
        assert.equal(styled, "<esc> (cancel)");
    });
});

describe("keySymbol", () => {
    test("maps each part of a chord", () => {
        assert.equal(keySymbol("ctrl+n"), "⌃n");
        assert.equal(keySymbol("esc"), "⎋");
        assert.equal(keySymbol("pgup"), "pgup");
    });
});

describe("controlBindings", () => {
    test("lists only the controls a widget honours", () => {
        assert.deepEqual(controlBindings(true, true), [
            { key: "esc", description: "cancel" },
            { key: "ctrl+c", description: "quit" },
        ]);
        assert.deepEqual(controlBindings(false, true), [{ key: "ctrl+c", description: "quit" }]);
        assert.deepEqual(controlBindings(false, false), []);
    });
});
