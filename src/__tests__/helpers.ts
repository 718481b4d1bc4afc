import type { HelpStyles } from "../help";
import { keyMsg, type Msg } from "../keys";
import type { IDisplaySink, IInputSource, RunIO } from "../terminal";
import { type Cmd, plain, type Widget } from "../widget";

export const plainHelp: HelpStyles = { key: plain, description: plain, separator: plain };

/** Replays a fixed list of messages, then reports end of input. */
export class ScriptedInput implements IInputSource {
    readonly pending: Msg[];
    closed = 0;

    constructor(msgs: Array<Msg | string>) {
        this.pending = msgs.map((m) => (typeof m === "string" ? keyMsg(m) : m));
    }

    next(): Promise<Msg | undefined> {
        return Promise.resolve(this.pending.shift());
    }

    close(): void {
        this.closed++;
    }
}

export class RecordingDisplay implements IDisplaySink {
    readonly frames: string[] = [];
    started = 0;
    stopped = 0;

    start(): void {
        this.started++;
    }
    render(frame: string): void {
        this.frames.push(frame);
    }
    stop(): void {
        this.stopped++;
    }
}

export interface ScriptedIO extends RunIO {
    input: ScriptedInput;
    display: RecordingDisplay;
}

export function scripted(...msgs: Array<Msg | string>): ScriptedIO {
    return { input: new ScriptedInput(msgs), display: new RecordingDisplay() };
}

/** Feed keys straight into a widget; returns the command of the last one. */
export function press<V>(widget: Widget<V>, ...keys: string[]): Cmd {
    let cmd: Cmd = undefined;
    for (const key of keys) cmd = widget.update(keyMsg(key));
    return cmd;
}
