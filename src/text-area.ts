import chalk from "chalk";
import { MultilineEditor, unitsAt } from "./editing";
import { controlBindings, type HelpStyles, renderHelp } from "./help";
import { type Style, Widget, type WidgetControls } from "./widget";

export interface TextAreaStyles {
    border: Style;
    prompt: Style;
    text: Style;
    cursor: Style;
    lineNumber: Style;
    placeholder: Style;
    help?: HelpStyles;
}

export const defaultTextAreaStyles = (): TextAreaStyles => ({
    border: (text) => chalk.gray(text),
    prompt: (text) => chalk.ansi256(63)(text),
    text: (text) => chalk.white(text),
    cursor: (text) => chalk.bgWhite.black(text),
    lineNumber: (text) => chalk.gray(text),
    placeholder: (text) => chalk.gray(text),
});

export interface TextAreaOptions extends WidgetControls {
    /** Drawn before every line inside the box. */
    prompt?: string;
    placeholder?: string;
    /** Default 100; 0 means unlimited. */
    charLimit?: number;
    /** Inner width of the box. Default 40. */
    maxWidth?: number;
    /** Lines the box shows and the most lines the text may have. Default 10. */
    maxHeight?: number;
    /** Default true. */
    showLineNumbers?: boolean;
    hideHelp?: boolean;
    styles?: Partial<TextAreaStyles>;
}

/** Trim every line and rejoin them with "\n". */
export function normalizeLines(text: string): string {
    return text
        .split("\n")
        .map((line) => line.trim())
        .join("\n");
}

/**
 * Multi-line text. enter trims every line of the stored text and finishes
 * only when the last line is blank; otherwise it starts a new line.
 */
export class TextArea extends Widget<string> {
    private readonly editor: MultilineEditor;
    private readonly prompt: string;
    private readonly placeholder: string;
    private readonly maxWidth: number;
    private readonly maxHeight: number;
    private readonly showLineNumbers: boolean;
    private readonly hideHelp: boolean;
    private readonly styles: TextAreaStyles;

    constructor(value = "", options: TextAreaOptions = {}) {
        super(options);
        this.maxWidth = options.maxWidth ?? 40;
        this.maxHeight = options.maxHeight ?? 10;
        this.editor = new MultilineEditor(value, {
            charLimit: options.charLimit ?? 100,
            maxHeight: this.maxHeight,
        });
        this.prompt = options.prompt ?? "";
        this.placeholder = options.placeholder ?? "";
        this.showLineNumbers = options.showLineNumbers ?? true;
        this.hideHelp = options.hideHelp ?? false;
        this.styles = { ...defaultTextAreaStyles(), ...options.styles };
        this._clampScroll();
    }

    value(): string {
        return this.editor.value();
    }

    setValue(v: string): void {
        this.editor.setValue(v);
        this._clampScroll();
    }

    protected accept(): boolean {
        this.editor.setValue(normalizeLines(this.editor.value()));
        this._clampScroll();
        const lines = this.editor.lines();
        return lines[lines.length - 1] === "";
    }

    protected handleKey(key: string): void {
        if (this.editor.handleKey(key)) this._clampScroll();
    }

    private _gutter(): number {
        return this.showLineNumbers ? String(this.maxHeight).length + 1 : 0;
    }

    private _textWidth(): number {
        return Math.max(1, this.maxWidth - this.prompt.length - this._gutter());
    }

    private _clampScroll(): void {
        this.editor.clampScroll(this._textWidth(), this.maxHeight);
    }

    view(): string {
        const s = this.styles;
        const iw = this.maxWidth;
        const tw = this._textWidth();
        const b = s.border;
        const lines = this.editor.lines();
        const scroll = this.editor.scroll();
        const isEmpty = lines.length === 1 && lines[0] === "";
        const out: string[] = [b("┌" + "─".repeat(iw) + "┐")];

        for (let visRow = 0; visRow < this.maxHeight; visRow++) {
            const absRow = scroll.y + visRow;
            const lineText = lines[absRow];
            const gutter = this.showLineNumbers
                ? s.lineNumber(
                      (lineText === undefined ? "" : String(absRow + 1)).padStart(this._gutter() - 1) + " ",
                  )
                : "";
            const prefix = b("│") + s.prompt(this.prompt) + gutter;

            if (lineText === undefined) {
                out.push(prefix + " ".repeat(tw) + b("│"));
                continue;
            }

            if (isEmpty && visRow === 0 && this.placeholder !== "") {
                const ph = this.placeholder.slice(0, tw).padEnd(tw);
                out.push(prefix + s.cursor(ph.slice(0, 1)) + s.placeholder(ph.slice(1)) + b("│"));
                continue;
            }

            const padded = lineText.slice(scroll.x, scroll.x + tw).padEnd(tw);
            if (absRow === this.editor.cursorRow()) {
                const relCol = this.editor.cursorCol() - scroll.x;
                const atLen = unitsAt(padded, relCol);
                out.push(
                    prefix +
                        s.text(padded.slice(0, relCol)) +
                        s.cursor(padded.slice(relCol, relCol + atLen) || " ") +
                        s.text(padded.slice(relCol + atLen)) +
                        b("│"),
                );
            } else {
                out.push(prefix + s.text(padded) + b("│"));
            }
        }

        out.push(b("└" + "─".repeat(iw) + "┘"));

        if (!this.hideHelp) {
            out.push(
                renderHelp(
                    [
                        { key: "enter", description: "on a blank line to finish" },
                        ...controlBindings(this.cancelable, this.quitable),
                    ],
                    { styles: s.help },
                ),
            );
        }
        return out.join("\n");
    }
}
