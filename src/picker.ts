import chalk from "chalk";
import { WidgetConfigError } from "./errors";
import { clampIndex, type Style, Widget, type WidgetControls } from "./widget";

export interface PickerStyles {
    label: Style;
    selected: Style;
    normal: Style;
}

export const defaultPickerStyles = (): PickerStyles => ({
    label: (text) => chalk.hex("#FFD700").bold(text),
    selected: (text) => chalk.hex("#00FF00")(text),
    normal: (text) => chalk.hex("#FFFFFF")(text),
});

export interface PickerOptions extends WidgetControls {
    label?: string;
    /** Clamped into range. Default 0. */
    selectedIndex?: number;
    /** `%s` marks where the item goes; without it the item is appended. */
    selectedFormat?: string;
    normalFormat?: string;
    /** Lay items out on one line instead of one per line. */
    horizontal?: boolean;
    styles?: Partial<PickerStyles>;
}

const NAV_PREV = new Set(["up", "left", "k"]);
const NAV_NEXT = new Set(["down", "right", "j"]);

/** Fill the first `%s` in `format` with `text`. */
export function applyFormat(format: string, text: string): string {
    const at = format.indexOf("%s");
    if (at < 0) return format + text;
    return format.slice(0, at) + text + format.slice(at + 2);
}

/**
 * Pick one string out of a short list. Navigation wraps around at both
 * ends; esc and ctrl+c leave the selection at -1.
 */
export class Picker extends Widget<string> {
    private readonly items: readonly string[];
    private readonly label: string;
    private readonly selectedFormat: string;
    private readonly normalFormat: string;
    private readonly horizontal: boolean;
    private readonly styles: PickerStyles;
    private _selected: number;

    constructor(items: readonly string[], options: PickerOptions = {}) {
        super(options);
        if (items.length === 0) throw new WidgetConfigError("Picker needs at least one item");

        this.items = [...items];
        this.label = options.label ?? "";
        this.selectedFormat = options.selectedFormat ?? "►%s◄";
        this.normalFormat = options.normalFormat ?? " %s ";
        this.horizontal = options.horizontal ?? false;
        this.styles = { ...defaultPickerStyles(), ...options.styles };
        this._selected = clampIndex(options.selectedIndex, items.length);
    }

    selectedIndex(): number {
        return this._selected;
    }

    /** The selected item, or "" after cancel or quit. */
    selectedItem(): string {
        return this.items[this._selected] ?? "";
    }

    value(): string {
        return this.selectedItem();
    }

    protected onAbort(): void {
        this._selected = -1;
    }

    protected handleKey(key: string): void {
        const len = this.items.length;
        if (NAV_PREV.has(key)) {
            this._selected = (this._selected - 1 + len) % len;
        } else if (NAV_NEXT.has(key)) {
            this._selected = (this._selected + 1) % len;
        }
    }

    view(): string {
        let out = "";

        if (this.label !== "") {
            out += this.styles.label(this.label) + (this.horizontal ? " " : "\n");
        }

        const rendered = this.items.map((item, i) =>
            i === this._selected
                ? applyFormat(this.selectedFormat, this.styles.selected(item))
                : applyFormat(this.normalFormat, this.styles.normal(item)),
        );

        return out + rendered.join(this.horizontal ? "  " : "\n");
    }
}
