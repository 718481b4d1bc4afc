import chalk from "chalk";
import { WidgetConfigError } from "./errors";
import { controlBindings, type HelpStyles, renderHelp } from "./help";
import { isPrintable } from "./keys";
import { clampIndex, type Style, Widget, type WidgetControls } from "./widget";

export interface ListItem {
    title: string;
    description: string;
}

export function listItem(title: string, description = ""): ListItem {
    return { title, description };
}

export interface ItemListStyles {
    title: Style;
    selectedTitle: Style;
    selectedDescription: Style;
    normalTitle: Style;
    normalDescription: Style;
    dim: Style;
    help?: HelpStyles;
}

export const defaultItemListStyles = (): ItemListStyles => ({
    title: (text) => chalk.bgHex("#5F5FD7").white(` ${text} `),
    selectedTitle: (text) => chalk.hex("#EE6FF8")(`│ ${text}`),
    selectedDescription: (text) => chalk.hex("#AD58B4")(`│ ${text}`),
    normalTitle: (text) => chalk.white(`  ${text}`),
    normalDescription: (text) => chalk.gray(`  ${text}`),
    dim: (text) => chalk.gray(text),
});

export interface ItemListOptions extends WidgetControls {
    title?: string;
    /** Clamped into range. Default 0. */
    selectedIndex?: number;
    /** Drawing area before the first resize. */
    width?: number;
    height?: number;
    styles?: Partial<ItemListStyles>;
}

// Margin around the list: one row above and below, two columns each side.
const FRAME_H = 4;
const FRAME_V = 2;
// Title and description plus a blank spacer row.
const ITEM_HEIGHT = 3;

/**
 * A paged list of title/description items. Navigation stops at both ends;
 * `/` starts a case-insensitive title filter.
 */
export class ItemList extends Widget<ListItem | undefined> {
    private readonly items: readonly ListItem[];
    private readonly title: string;
    private readonly styles: ItemListStyles;
    private _width: number;
    private _height: number;
    private _index: number;
    private _filter = "";
    private _filtering = false;
    private _visible: number[];

    constructor(items: readonly ListItem[], options: ItemListOptions = {}) {
        super(options);
        if (items.length === 0) throw new WidgetConfigError("ItemList needs at least one item");

        this.items = [...items];
        this.title = options.title ?? "";
        this.styles = { ...defaultItemListStyles(), ...options.styles };
        this._width = options.width ?? 80;
        this._height = options.height ?? 14;
        this._index = clampIndex(options.selectedIndex, items.length);
        this._visible = this.items.map((_, i) => i);
    }

    /** Index into the full item list; -1 after cancel or quit. */
    selectedIndex(): number {
        return this._index;
    }

    selectedItem(): ListItem | undefined {
        if (this._index < 0 || !this._visible.includes(this._index)) return undefined;
        return this.items[this._index];
    }

    value(): ListItem | undefined {
        return this.selectedItem();
    }

    filter(): string {
        return this._filter;
    }

    filtering(): boolean {
        return this._filtering;
    }

    /** Items that fit on one page at the current size. */
    perPage(): number {
        const reserved = (this.title ? 2 : 0) + 3 + (this._filtering || this._filter ? 1 : 0);
        return Math.max(1, Math.floor((this._height - reserved) / ITEM_HEIGHT));
    }

    protected accept(): boolean {
        return this.selectedItem() !== undefined;
    }

    protected onAbort(): void {
        this._index = -1;
    }

    protected resize(columns: number, rows: number): void {
        this._width = Math.max(1, columns - FRAME_H);
        this._height = Math.max(1, rows - FRAME_V);
    }

    protected handleKey(key: string): void {
        if (this._filtering && this._filterKey(key)) return;

        switch (key) {
            case "up":
            case "k":
                this._moveTo(this._cursor() - 1);
                break;
            case "down":
            case "j":
                this._moveTo(this._cursor() + 1);
                break;
            case "left":
            case "h":
            case "pageup":
                this._moveTo(this._cursor() - this.perPage());
                break;
            case "right":
            case "l":
            case "pagedown":
                this._moveTo(this._cursor() + this.perPage());
                break;
            case "home":
            case "g":
                this._moveTo(0);
                break;
            case "end":
            case "G":
                this._moveTo(this._visible.length - 1);
                break;
            case "/":
                this._filtering = true;
                break;
            case "esc":
                this._setFilter("");
                this._filtering = false;
                break;
        }
    }

    /** Keys typed while the filter prompt is open. */
    private _filterKey(key: string): boolean {
        if (key === "backspace") {
            this._setFilter(this._filter.slice(0, -1));
            return true;
        }
        if (key === "esc") {
            this._setFilter("");
            this._filtering = false;
            return true;
        }
        if (key !== "/" && isPrintable(key)) {
            this._setFilter(this._filter + key);
            return true;
        }
        return false;
    }

    private _setFilter(filter: string): void {
        this._filter = filter;
        const needle = filter.toLowerCase();
        this._visible = this.items
            .map((item, i) => ({ item, i }))
            .filter(({ item }) => item.title.toLowerCase().includes(needle))
            .map(({ i }) => i);

        const first = this._visible[0];
        if (!this._visible.includes(this._index) && first !== undefined) {
            this._index = first;
        }
    }

    /** Position of the highlighted item among the visible ones. */
    private _cursor(): number {
        return Math.max(0, this._visible.indexOf(this._index));
    }

    private _moveTo(position: number): void {
        const clamped = Math.max(0, Math.min(position, this._visible.length - 1));
        const next = this._visible[clamped];
        if (next !== undefined) this._index = next;
    }

    view(): string {
        const lines: string[] = [];
        const s = this.styles;

        if (this.title) {
            lines.push(s.title(this.title), "");
        }
        if (this._filtering || this._filter) {
            lines.push(s.dim("Filter: ") + this._filter + (this._filtering ? "█" : ""));
        }

        const perPage = this.perPage();
        const cursor = this._cursor();
        const page = Math.floor(cursor / perPage);
        const pages = Math.max(1, Math.ceil(this._visible.length / perPage));
        const pageItems = this._visible.slice(page * perPage, (page + 1) * perPage);

        if (pageItems.length === 0) {
            lines.push(s.dim("No items."));
        }
        pageItems.forEach((itemIdx, n) => {
            const item = this.items[itemIdx];
            if (!item) return;
            const selected = itemIdx === this._index;
            const maxWidth = Math.max(1, this._width - 2);
            const title = truncate(item.title, maxWidth);
            const desc = truncate(item.description, maxWidth);
            if (n > 0) lines.push("");
            lines.push(selected ? s.selectedTitle(title) : s.normalTitle(title));
            lines.push(selected ? s.selectedDescription(desc) : s.normalDescription(desc));
        });

        lines.push("");
        if (pages > 1) lines.push(s.dim(`${page + 1}/${pages}`));
        lines.push(
            renderHelp(
                [
                    { key: "↑/k", description: "up" },
                    { key: "↓/j", description: "down" },
                    { key: "/", description: "filter" },
                    ...controlBindings(this.cancelable, this.quitable),
                ],
                { styles: s.help },
            ),
        );

        return lines.join("\n");
    }
}

function truncate(text: string, max: number): string {
    if (text.length <= max) return text;
    return text.slice(0, Math.max(0, max - 1)) + "…";
}
