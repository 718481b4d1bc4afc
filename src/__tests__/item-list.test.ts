import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { WidgetConfigError } from "../errors";
import { ItemList, type ItemListStyles, type ListItem, listItem } from "../item-list";
import { resizeMsg } from "../keys";
import { plain } from "../widget";
import { plainHelp, press } from "./helpers";

const styles: ItemListStyles = {
    title: plain,
    selectedTitle: (t) => `│ ${t}`,
    selectedDescription: (t) => `│ ${t}`,
    normalTitle: (t) => `  ${t}`,
    normalDescription: (t) => `  ${t}`,
    dim: plain,
    help: plainHelp,
};

const fruit: ListItem[] = [
    listItem("Apple", "Red"),
    listItem("Banana", "Yellow"),
    listItem("Cherry", "Dark red"),
    listItem("Grape", "Purple"),
];

function numbered(n: number): ListItem[] {
    return Array.from({ length: n }, (_, i) => listItem(`Item ${i}`));
}

describe("ItemList navigation", () => {
    test("the initial index is a whole number in range", () => {
        assert.equal(new ItemList(fruit, { selectedIndex: 2.5 }).selectedIndex(), 2);
        assert.equal(new ItemList(fruit, { selectedIndex: Number.NaN }).selectedIndex(), 0);
        assert.equal(new ItemList(fruit, { selectedIndex: 9 }).selectedIndex(), 3);
    });

    test("stops at both ends", () => {
        const l = new ItemList(fruit.slice(0, 3));
        press(l, "up");
        assert.equal(l.selectedIndex(), 0);
        press(l, "down", "down", "down", "down");
        assert.equal(l.selectedIndex(), 2);
    });

    test("vim keys and home/end", () => {
        const l = new ItemList(fruit);
        press(l, "j", "j");
        assert.equal(l.selectedIndex(), 2);
        press(l, "k");
        assert.equal(l.selectedIndex(), 1);
        press(l, "G");
        assert.equal(l.selectedIndex(), 3);
        press(l, "home");
        assert.equal(l.selectedIndex(), 0);
    });

    test("pages by the number of items that fit", () => {
        const l = new ItemList(numbered(10));
        assert.equal(l.perPage(), 3);
        press(l, "right");
        assert.equal(l.selectedIndex(), 3);
        press(l, "pagedown");
        assert.equal(l.selectedIndex(), 6);
        press(l, "end", "pageup");
        assert.equal(l.selectedIndex(), 6);
    });

    test("resize changes the page size", () => {
        const l = new ItemList(numbered(10));
        assert.equal(l.update(resizeMsg(80, 11)), undefined);
        assert.equal(l.perPage(), 2);
        assert.equal(l.terminal(), false);
    });

    test("needs at least one item", () => {
        assert.throws(() => new ItemList([]), WidgetConfigError);
    });
});

describe("ItemList filter", () => {
    test("narrows by title and keeps navigation inside the matches", () => {
        const l = new ItemList(fruit);
        press(l, "/", "a", "p");
        assert.equal(l.filter(), "ap");
        assert.equal(l.selectedIndex(), 0);
        press(l, "down");
        assert.equal(l.selectedIndex(), 3);
        press(l, "enter");
        assert.deepEqual(l.value(), listItem("Grape", "Purple"));
    });

    test("letters go to the filter, not to navigation", () => {
        const l = new ItemList(fruit);
        press(l, "/", "j");
        assert.equal(l.filter(), "j");
        assert.equal(l.selectedIndex(), 0);
    });

    test("enter does nothing when nothing matches", () => {
        const l = new ItemList(fruit);
        assert.equal(press(l, "/", "z", "enter"), undefined);
        assert.equal(l.terminal(), false);
        assert.equal(l.selectedItem(), undefined);
        assert.equal(l.selectedIndex(), 0);
    });

    test("backspace widens the filter again", () => {
        const l = new ItemList(fruit);
        press(l, "/", "z", "backspace", "down");
        assert.equal(l.filter(), "");
        assert.equal(l.selectedIndex(), 1);
    });

    test("esc clears the filter when the list is not cancelable", () => {
        const l = new ItemList(fruit, { cancelable: false });
        press(l, "/", "b");
        assert.equal(press(l, "esc"), undefined);
        assert.equal(l.filter(), "");
        assert.equal(l.filtering(), false);
        assert.equal(l.terminal(), false);
    });
});

describe("ItemList outcomes", () => {
    test("enter confirms the highlighted item", () => {
        const l = new ItemList(fruit, { selectedIndex: 1 });
        assert.equal(press(l, "enter"), "quit");
        assert.deepEqual(l.state(), {
            value: listItem("Banana", "Yellow"),
            selectedIndex: 1,
            canceled: false,
            quit: false,
            terminal: true,
        });
    });

    test("esc cancels", () => {
        const l = new ItemList(fruit);
        assert.equal(press(l, "esc"), "quit");
        assert.deepEqual(l.state(), {
            value: undefined,
            selectedIndex: -1,
            canceled: true,
            quit: false,
            terminal: true,
        });
    });

    test("ctrl+c quits", () => {
        const l = new ItemList(fruit);
        press(l, "ctrl+c");
        assert.equal(l.canceled(), true);
        assert.equal(l.quit(), true);
        assert.equal(l.selectedIndex(), -1);
    });

    test("esc and ctrl+c are inert when disabled", () => {
        const l = new ItemList(fruit, { cancelable: false, quitable: false });
        press(l, "esc", "ctrl+c");
        assert.equal(l.terminal(), false);
        assert.equal(l.selectedIndex(), 0);
    });
});

describe("ItemList view", () => {
    test("title, items and help", () => {
        const l = new ItemList(fruit.slice(0, 2), { title: "Fruit", styles });
        assert.equal(
            l.view(),
            [
                "Fruit",
                "",
                "│ Apple",
                "│ Red",
                "",
                "  Banana",
                "  Yellow",
                "",
                "↑/k up • ↓/j down • / filter • esc cancel • ctrl+c quit",
            ].join("\n"),
        );
    });

    test("shows the page when there is more than one", () => {
        const l = new ItemList(numbered(10), { styles });
        const lines = l.view().split("\n");
        assert.equal(lines[lines.length - 2], "1/4");
        press(l, "end");
        const last = l.view().split("\n");
        assert.equal(last[last.length - 2], "4/4");
    });

    test("shows the filter prompt and an empty result", () => {
        const l = new ItemList(fruit, { styles, quitable: false });
        press(l, "/", "z");
        assert.equal(l.view(), ["Filter: z█", "No items.", "", "↑/k up • ↓/j down • / filter • esc cancel"].join("\n"));
    });

    test("truncates long titles", () => {
        const l = new ItemList([listItem("Blueberry", "Small")], { width: 6, styles });
        assert.equal(l.view().split("\n")[0], "│ Blu…");
    });
});
