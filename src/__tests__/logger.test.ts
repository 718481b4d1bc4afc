import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { ConfigError } from "../errors";
import { getLogger } from "../logger";

describe("getLogger", () => {
    test("widgets load under a bad environment; the logger reports it on first use", async () => {
        const saved = process.env.TERMPICK_LOG_LEVEL;
        process.env.TERMPICK_LOG_LEVEL = "loud";
        try {
            const { Picker } = await import("../picker");
            const p = new Picker(["a", "b"]);
            assert.equal(p.selectedItem(), "a");
            assert.throws(() => getLogger(), ConfigError);
        } finally {
            if (saved === undefined) {
                delete process.env.TERMPICK_LOG_LEVEL;
            } else {
                process.env.TERMPICK_LOG_LEVEL = saved;
            }
        }
    });

    test("is built once", () => {
        assert.equal(getLogger(), getLogger());
    });
});
