import * as readline from "readline";
import { loadConfig } from "./config";
import { keyMsg, keyName, type Msg, resizeMsg } from "./keys";
import { getLogger } from "./logger";

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. ABSTRACTIONS
// ══════════════════════════════════════════════════════════════════════════════

/** Ordered, one-at-a-time input. `undefined` means the input has ended. */
export interface IInputSource {
    next(): Promise<Msg | undefined>;
    close(): void;
}

/** Shows one frame at a time; each render replaces the previous frame. */
export interface IDisplaySink {
    start(): void;
    render(frame: string): void;
    stop(): void;
}

export interface RunIO {
    input: IInputSource;
    display: IDisplaySink;
}

/** What the keypress source reads; raw mode is used when the stream has it. */
export type KeyInput = NodeJS.ReadableStream & {
    isTTY?: boolean;
    isRaw?: boolean;
    setRawMode?(mode: boolean): unknown;
};

/** Where resize events and the terminal size come from. */
export type SizedOutput = NodeJS.EventEmitter & {
    columns: number;
    rows: number;
    isTTY?: boolean;
};

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. KEYPRESS SOURCE  (stdin in raw mode)
// ══════════════════════════════════════════════════════════════════════════════

export class KeypressSource implements IInputSource {
    private readonly _queue: Msg[] = [];
    private _waiter: ((msg: Msg | undefined) => void) | undefined;
    private _ended = false;
    private _closed = false;
    private readonly _wasRaw: boolean;

    private readonly _onKeypress = (str: string | undefined, key: readline.Key | undefined) => {
        this._push(keyMsg(keyName(str, key)));
    };
    private readonly _onResize = () => {
        this._push(resizeMsg(this.output.columns, this.output.rows));
    };
    private readonly _onEnd = () => {
        this._ended = true;
        this._flush(undefined);
    };

    constructor(
        private readonly input: KeyInput = process.stdin,
        private readonly output: SizedOutput = process.stdout,
    ) {
        this._wasRaw = input.isRaw ?? false;
        readline.emitKeypressEvents(input);
        if (input.isTTY) input.setRawMode?.(true);

        input.on("keypress", this._onKeypress);
        input.on("end", this._onEnd);
        output.on("resize", this._onResize);
        input.resume();

        // Widgets size themselves from the first message, as after a resize.
        if (output.isTTY) this._onResize();
    }

    next(): Promise<Msg | undefined> {
        const msg = this._queue.shift();
        if (msg) return Promise.resolve(msg);
        if (this._ended || this._closed) return Promise.resolve(undefined);
        return new Promise((resolve) => {
            this._waiter = resolve;
        });
    }

    close(): void {
        if (this._closed) return;
        this._closed = true;
        this.input.off("keypress", this._onKeypress);
        this.input.off("end", this._onEnd);
        this.output.off("resize", this._onResize);
        if (this.input.isTTY) this.input.setRawMode?.(this._wasRaw);
        this.input.pause();
        this._flush(undefined);
    }

    private _push(msg: Msg): void {
        if (this._closed) return;
        if (this._waiter) {
            this._flush(msg);
        } else {
            this._queue.push(msg);
        }
    }

    private _flush(msg: Msg | undefined): void {
        const waiter = this._waiter;
        this._waiter = undefined;
        waiter?.(msg);
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 3. TERMINAL DISPLAY  (inline frames or the alternate screen)
// ══════════════════════════════════════════════════════════════════════════════

export class TerminalDisplay implements IDisplaySink {
    private _active = false;
    private _lines = 0;

    constructor(
        private readonly output: NodeJS.WritableStream = process.stdout,
        private readonly altScreen = false,
    ) {}

    start(): void {
        if (this._active) return;
        this._active = true;
        this._lines = 0;
        if (this.altScreen) this.output.write("\x1b[?1049h\x1b[2J\x1b[H");
        this.output.write("\x1b[?25l");
    }

    render(frame: string): void {
        if (this.altScreen) {
            readline.cursorTo(this.output, 0, 0);
        } else if (this._lines > 0) {
            readline.moveCursor(this.output, 0, -(this._lines - 1));
            readline.cursorTo(this.output, 0);
        }
        readline.clearScreenDown(this.output);
        this.output.write(frame);
        this._lines = frame.split("\n").length;
    }

    stop(): void {
        if (!this._active) return;
        this._active = false;
        this.output.write("\x1b[?25h");
        if (this.altScreen) {
            this.output.write("\x1b[?1049l");
        } else if (this._lines > 0) {
            this.output.write("\n");
        }
    }
}

export interface TerminalIOOptions {
    input?: NodeJS.ReadStream;
    output?: NodeJS.WriteStream;
    altScreen?: boolean;
}

/** stdin keypresses in, stdout frames out. */
export function terminalIO(options: TerminalIOOptions = {}): RunIO {
    const output = options.output ?? process.stdout;
    const altScreen = options.altScreen ?? loadConfig().altScreen;
    getLogger().debug("terminal io", { altScreen, tty: Boolean(output.isTTY) });
    return {
        input: new KeypressSource(options.input ?? process.stdin, output),
        display: new TerminalDisplay(output, altScreen),
    };
}
