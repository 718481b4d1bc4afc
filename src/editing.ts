import { isPrintable } from "./keys";

// ══════════════════════════════════════════════════════════════════════════════
//  § 0. CODE POINTS  (cursors are UTF-16 offsets that never split a pair)
// ══════════════════════════════════════════════════════════════════════════════

const isHighSurrogate = (c: number) => c >= 0xd800 && c <= 0xdbff;
const isLowSurrogate = (c: number) => c >= 0xdc00 && c <= 0xdfff;

/** UTF-16 units of the character starting at `i`; 0 at the end. */
export function unitsAt(s: string, i: number): number {
    if (i >= s.length) return 0;
    return isHighSurrogate(s.charCodeAt(i)) && isLowSurrogate(s.charCodeAt(i + 1)) ? 2 : 1;
}

/** UTF-16 units of the character ending at `i`; 0 at the start. */
export function unitsBefore(s: string, i: number): number {
    if (i <= 0) return 0;
    return i >= 2 && isLowSurrogate(s.charCodeAt(i - 1)) && isHighSurrogate(s.charCodeAt(i - 2)) ? 2 : 1;
}

/** Pull `i` back when it falls inside a surrogate pair. */
function snapToChar(s: string, i: number): number {
    return isHighSurrogate(s.charCodeAt(i - 1)) && isLowSurrogate(s.charCodeAt(i)) ? i - 1 : i;
}

export function charCount(s: string): number {
    return Array.from(s).length;
}

/** The first `limit` characters of `s`; all of it when `limit` is 0 or less. */
export function truncateChars(s: string, limit: number): string {
    return limit > 0 ? Array.from(s).slice(0, limit).join("") : s;
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. SCROLL STATE
// ══════════════════════════════════════════════════════════════════════════════

export class ScrollState {
    private _x = 0;
    private _y = 0;

    get x(): number {
        return this._x;
    }
    get y(): number {
        return this._y;
    }

    reset(): void {
        this._x = 0;
        this._y = 0;
    }

    /** Keep a cursor column inside a viewport `viewportWidth` wide. */
    clampHorizontal(cursor: number, viewportWidth: number): void {
        if (viewportWidth <= 0) {
            this._x = 0;
            return;
        }
        if (cursor < this._x) this._x = cursor;
        if (cursor >= this._x + viewportWidth)
            this._x = cursor - viewportWidth + 1;
        this._x = Math.max(0, this._x);
    }

    /** Keep a cursor row inside a viewport `viewportHeight` tall. */
    clampVertical(
        cursor: number,
        viewportHeight: number,
        maxScroll: number,
    ): void {
        if (cursor < this._y) this._y = cursor;
        if (cursor >= this._y + viewportHeight)
            this._y = cursor - viewportHeight + 1;
        this._y = Math.max(0, Math.min(this._y, maxScroll));
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. LINE EDITOR  (single line, char limit, prefix suggestions)
// ══════════════════════════════════════════════════════════════════════════════

export interface LineEditorOptions {
    /** Maximum characters; 0 or less means unlimited. */
    charLimit?: number;
    /** Visible columns; 0 or less shows the whole value. */
    width?: number;
    suggestions?: string[];
}

export class LineEditor {
    private _value = "";
    private _cursor = 0;
    private _scroll = new ScrollState();
    private _suggestions: string[] = [];
    private _matches: string[] = [];
    private _match = 0;

    readonly charLimit: number;
    readonly width: number;

    constructor(value = "", options: LineEditorOptions = {}) {
        this.charLimit = options.charLimit ?? 0;
        this.width = options.width ?? 0;
        this._suggestions = [...(options.suggestions ?? [])];
        this.setValue(value);
    }

    value(): string {
        return this._value;
    }
    cursor(): number {
        return this._cursor;
    }
    scrollX(): number {
        return this._scroll.x;
    }

    setValue(v: string): void {
        this._value = truncateChars(v, this.charLimit);
        this._cursor = this._value.length;
        this._changed();
    }

    setSuggestions(suggestions: string[]): void {
        this._suggestions = [...suggestions];
        this._refreshMatches();
    }

    /** Suggestions whose prefix matches the value, ignoring case. */
    matchedSuggestions(): string[] {
        return [...this._matches];
    }

    currentSuggestion(): string | undefined {
        return this._matches[this._match];
    }

    /** Returns false when the key means nothing to the editor. */
    handleKey(key: string): boolean {
        switch (key) {
            case "left":
            case "ctrl+b":
                this._cursor -= unitsBefore(this._value, this._cursor);
                break;
            case "right":
            case "ctrl+f":
                this._cursor += unitsAt(this._value, this._cursor);
                break;
            case "home":
            case "ctrl+a":
                this._cursor = 0;
                break;
            case "end":
            case "ctrl+e":
                this._cursor = this._value.length;
                break;
            case "backspace":
                this._cut(this._cursor - unitsBefore(this._value, this._cursor), this._cursor);
                break;
            case "delete":
                this._cut(this._cursor, this._cursor + unitsAt(this._value, this._cursor));
                break;
            case "ctrl+u":
                this._value = this._value.slice(this._cursor);
                this._cursor = 0;
                this._changed();
                break;
            case "ctrl+k":
                this._value = this._value.slice(0, this._cursor);
                this._changed();
                break;
            case "tab":
                this._acceptSuggestion();
                break;
            case "ctrl+n":
            case "down":
                this._cycle(1);
                break;
            case "ctrl+p":
            case "up":
                this._cycle(-1);
                break;
            default:
                if (!isPrintable(key)) return false;
                this._insert(key);
        }

        this._clampScroll();
        return true;
    }

    private _cut(from: number, to: number): void {
        if (from === to) return;
        this._value = this._value.slice(0, from) + this._value.slice(to);
        this._cursor = from;
        this._changed();
    }

    private _insert(text: string): void {
        if (this.charLimit > 0 && charCount(this._value) + charCount(text) > this.charLimit) return;
        this._value =
            this._value.slice(0, this._cursor) +
            text +
            this._value.slice(this._cursor);
        this._cursor += text.length;
        this._changed();
    }

    private _acceptSuggestion(): void {
        const suggestion = this.currentSuggestion();
        if (suggestion === undefined) return;
        this.setValue(suggestion);
    }

    private _cycle(direction: 1 | -1): void {
        const len = this._matches.length;
        if (len === 0) return;
        this._match = (this._match + direction + len) % len;
    }

    private _changed(): void {
        this._refreshMatches();
        this._clampScroll();
    }

    private _refreshMatches(): void {
        const prefix = this._value.toLowerCase();
        this._matches = prefix
            ? this._suggestions.filter((s) => s.toLowerCase().startsWith(prefix))
            : [];
        this._match = 0;
    }

    private _clampScroll(): void {
        this._scroll.clampHorizontal(this._cursor, this.width);
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 3. MULTILINE EDITOR
// ══════════════════════════════════════════════════════════════════════════════

export interface MultilineEditorOptions {
    /** Maximum characters, newlines included; 0 or less means unlimited. */
    charLimit?: number;
    /** Maximum number of lines; 0 or less means unlimited. */
    maxHeight?: number;
}

export class MultilineEditor {
    private _lines: string[] = [""];
    private _cursorRow = 0;
    private _cursorCol = 0;
    private _scroll = new ScrollState();

    readonly charLimit: number;
    readonly maxHeight: number;

    constructor(value = "", options: MultilineEditorOptions = {}) {
        this.charLimit = options.charLimit ?? 0;
        this.maxHeight = options.maxHeight ?? 0;
        this.setValue(value);
    }

    value(): string {
        return this._lines.join("\n");
    }
    lines(): readonly string[] {
        return this._lines;
    }
    cursorRow(): number {
        return this._cursorRow;
    }
    cursorCol(): number {
        return this._cursorCol;
    }
    scroll(): ScrollState {
        return this._scroll;
    }

    /**
     * Replace the content and put the cursor at the very end. Lines past
     * maxHeight are dropped first, then characters past charLimit.
     */
    setValue(v: string): void {
        const lines = v.split("\n");
        const kept = this.maxHeight > 0 ? lines.slice(0, this.maxHeight) : lines;
        this._lines = truncateChars(kept.join("\n"), this.charLimit).split("\n");
        this._cursorRow = this._lines.length - 1;
        this._cursorCol = this._currentLine().length;
        this._scroll.reset();
    }

    /** Keep the cursor visible inside a `width` x `height` viewport. */
    clampScroll(width: number, height: number): void {
        const maxScrollY = Math.max(0, this._lines.length - height);
        this._scroll.clampVertical(this._cursorRow, height, maxScrollY);
        this._scroll.clampHorizontal(this._cursorCol, width);
    }

    handleKey(key: string): boolean {
        switch (key) {
            case "left":
                this._step(-1);
                break;
            case "right":
                this._step(1);
                break;
            case "up":
                this._moveRow(-1);
                break;
            case "down":
                this._moveRow(1);
                break;
            case "home":
            case "ctrl+a":
                this._cursorCol = 0;
                break;
            case "end":
            case "ctrl+e":
                this._cursorCol = this._currentLine().length;
                break;
            case "backspace":
                this._remove(-1);
                break;
            case "delete":
                this._remove(1);
                break;
            case "enter":
                this._insertNewline();
                break;
            default:
                if (!isPrintable(key)) return false;
                this._insertChar(key);
        }
        return true;
    }

    private _currentLine(): string {
        return this._lines[this._cursorRow] ?? "";
    }

    private _full(text: string): boolean {
        return this.charLimit > 0 && charCount(this.value()) + charCount(text) > this.charLimit;
    }

    private _placeAt(row: number, col: number): void {
        this._cursorRow = row;
        const line = this._currentLine();
        this._cursorCol = snapToChar(line, Math.min(col, line.length));
    }

    /** One character back or forward; line ends connect to the next line. */
    private _step(dir: -1 | 1): void {
        const line = this._currentLine();
        const n = dir < 0 ? unitsBefore(line, this._cursorCol) : unitsAt(line, this._cursorCol);
        if (n > 0) {
            this._cursorCol += dir * n;
        } else if (dir < 0 && this._cursorRow > 0) {
            this._placeAt(this._cursorRow - 1, Infinity);
        } else if (dir > 0 && this._cursorRow < this._lines.length - 1) {
            this._placeAt(this._cursorRow + 1, 0);
        }
    }

    /** Same column on the row above or below, pulled back to that row's end. */
    private _moveRow(delta: -1 | 1): void {
        const row = this._cursorRow + delta;
        if (row >= 0 && row < this._lines.length) this._placeAt(row, this._cursorCol);
    }

    /** backspace (-1) or delete (1); at a line edge the two lines join. */
    private _remove(dir: -1 | 1): void {
        const row = this._cursorRow;
        const col = this._cursorCol;
        const line = this._currentLine();
        const n = dir < 0 ? unitsBefore(line, col) : unitsAt(line, col);

        if (n > 0) {
            const from = dir < 0 ? col - n : col;
            this._lines[row] = line.slice(0, from) + line.slice(from + n);
            this._cursorCol = from;
        } else if (dir < 0 && row > 0) {
            this._joinWithNext(row - 1);
        } else if (dir > 0 && row < this._lines.length - 1) {
            this._joinWithNext(row);
        }
    }

    /** Merge `row + 1` into `row`; the cursor lands on the seam. */
    private _joinWithNext(row: number): void {
        const head = this._lines[row] ?? "";
        this._lines.splice(row, 2, head + (this._lines[row + 1] ?? ""));
        this._cursorRow = row;
        this._cursorCol = head.length;
    }

    private _insertChar(ch: string): void {
        if (this._full(ch)) return;
        const line = this._currentLine();
        this._lines[this._cursorRow] =
            line.slice(0, this._cursorCol) + ch + line.slice(this._cursorCol);
        this._cursorCol += ch.length;
    }

    private _insertNewline(): void {
        if (this._full("\n")) return;
        if (this.maxHeight > 0 && this._lines.length >= this.maxHeight) return;
        const line = this._currentLine();
        this._lines.splice(
            this._cursorRow,
            1,
            line.slice(0, this._cursorCol),
            line.slice(this._cursorCol),
        );
        this._cursorRow++;
        this._cursorCol = 0;
    }
}
