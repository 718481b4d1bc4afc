import chalk from "chalk";
import { LineEditor, unitsAt } from "./editing";
import { controlBindings, type HelpStyles, renderHelp } from "./help";
import { type Style, Widget, type WidgetControls } from "./widget";

export interface TextInputStyles {
    prompt: Style;
    text: Style;
    cursor: Style;
    placeholder: Style;
    suggestion: Style;
    help?: HelpStyles;
}

export const defaultTextInputStyles = (): TextInputStyles => ({
    prompt: (text) => chalk.ansi256(63)(text),
    text: (text) => text,
    cursor: (text) => chalk.inverse(text),
    placeholder: (text) => chalk.gray(text),
    suggestion: (text) => chalk.gray(text),
});

export interface TextInputOptions extends WidgetControls {
    prompt?: string;
    placeholder?: string;
    suggestions?: string[];
    /** Default 100; 0 means unlimited. */
    charLimit?: number;
    /** Visible columns. Default 40; 0 shows the whole value. */
    width?: number;
    /** Hide the key help line under the field. */
    hideHelp?: boolean;
    styles?: Partial<TextInputStyles>;
}

/** Single-line free text with prefix autocomplete. */
export class TextInput extends Widget<string> {
    private readonly editor: LineEditor;
    private readonly prompt: string;
    private readonly placeholder: string;
    private readonly hideHelp: boolean;
    private readonly styles: TextInputStyles;

    constructor(value = "", options: TextInputOptions = {}) {
        super(options);
        this.editor = new LineEditor(value, {
            charLimit: options.charLimit ?? 100,
            width: options.width ?? 40,
            suggestions: options.suggestions,
        });
        this.prompt = options.prompt ?? "> ";
        this.placeholder = options.placeholder ?? "";
        this.hideHelp = options.hideHelp ?? false;
        this.styles = { ...defaultTextInputStyles(), ...options.styles };
    }

    value(): string {
        return this.editor.value();
    }

    setValue(v: string): void {
        this.editor.setValue(v);
    }

    /** The suggestion tab would complete to, if any. */
    suggestion(): string | undefined {
        return this.editor.currentSuggestion();
    }

    protected handleKey(key: string): void {
        this.editor.handleKey(key);
    }

    view(): string {
        const field = this.styles.prompt(this.prompt) + this._field();
        if (this.hideHelp) return field;

        const help = renderHelp(
            [
                { key: "tab", description: "complete" },
                { key: "ctrl+n", description: "next" },
                { key: "ctrl+p", description: "prev" },
                ...controlBindings(this.cancelable, this.quitable),
            ],
            { styles: this.styles.help },
        );
        return `${field}\n${help}`;
    }

    private _field(): string {
        const s = this.styles;
        const value = this.editor.value();

        if (value === "" && this.placeholder !== "") {
            return s.cursor(this.placeholder.slice(0, 1)) + s.placeholder(this.placeholder.slice(1));
        }

        const width = this.editor.width;
        const start = this.editor.scrollX();
        const visible = width > 0 ? value.slice(start, start + width) : value;
        const rel = this.editor.cursor() - start;

        const before = visible.slice(0, rel);
        const atLen = unitsAt(visible, rel);
        const atCursor = visible.slice(rel, rel + atLen);
        const after = visible.slice(rel + atLen);

        if (atCursor !== "") {
            return s.text(before) + s.cursor(atCursor) + s.text(after);
        }

        // Cursor sits past the end: the block covers the first ghost char.
        const suggestion = this.editor.currentSuggestion();
        const ghost =
            suggestion !== undefined && this.editor.cursor() === value.length
                ? suggestion.slice(value.length)
                : "";
        return s.text(before) + s.cursor(ghost.slice(0, 1) || " ") + s.suggestion(ghost.slice(1));
    }
}
