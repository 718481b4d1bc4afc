import type { Msg } from "./keys";
import { getLogger } from "./logger";
import type { StandardWidget } from "./outcome";

// ══════════════════════════════════════════════════════════════════════════════
//  § 1. ABSTRACTIONS
// ══════════════════════════════════════════════════════════════════════════════

/** Styling is per instance: a plain function from text to decorated text. */
export type Style = (text: string) => string;

export const plain: Style = (text) => text;

/** A whole index inside `[0, count)`; NaN and other non-finite values become 0. */
export function clampIndex(index: number | undefined, count: number): number {
    const whole = index !== undefined && Number.isFinite(index) ? Math.trunc(index) : 0;
    return Math.max(0, Math.min(whole, count - 1));
}

/** "quit" tells the host runner to stop reading input. */
export type Cmd = "quit" | undefined;

export interface WidgetControls {
    /** esc cancels the widget. Default true. */
    cancelable?: boolean;
    /** ctrl+c quits the widget and, by convention, the program. Default true. */
    quitable?: boolean;
}

export interface WidgetState<V> {
    value: V;
    /** Highlighted item for lists and pickers, -1 when there is none. */
    selectedIndex: number;
    canceled: boolean;
    quit: boolean;
    terminal: boolean;
}

/** What the host runner drives. */
export interface IModel<V> extends StandardWidget {
    init(): void;
    update(msg: Msg): Cmd;
    view(): string;
    value(): V;
    terminal(): boolean;
}

// ══════════════════════════════════════════════════════════════════════════════
//  § 2. WIDGET BASE
// ══════════════════════════════════════════════════════════════════════════════

/**
 * Shared lifecycle for every widget. enter, esc and ctrl+c are handled here
 * the same way for all of them; everything else goes to handleKey().
 *
 * Once a widget is terminal it ignores further messages.
 */
export abstract class Widget<V> implements IModel<V> {
    protected readonly cancelable: boolean;
    protected readonly quitable: boolean;

    private _canceled = false;
    private _quit = false;
    private _terminal = false;

    constructor(controls: WidgetControls = {}) {
        this.cancelable = controls.cancelable ?? true;
        this.quitable = controls.quitable ?? true;
    }

    canceled(): boolean {
        return this._canceled;
    }
    quit(): boolean {
        return this._quit;
    }
    terminal(): boolean {
        return this._terminal;
    }

    abstract value(): V;

    selectedIndex(): number {
        return -1;
    }

    state(): WidgetState<V> {
        return {
            value: this.value(),
            selectedIndex: this.selectedIndex(),
            canceled: this._canceled,
            quit: this._quit,
            terminal: this._terminal,
        };
    }

    init(): void {}

    update(msg: Msg): Cmd {
        if (this._terminal) return undefined;

        if (msg.type === "resize") {
            this.resize(msg.columns, msg.rows);
            return undefined;
        }

        switch (msg.key) {
            case "enter":
                if (this.accept()) return this._finish(false, false);
                break;
            case "esc":
                if (this.cancelable) return this._finish(true, false);
                break;
            case "ctrl+c":
                if (this.quitable) return this._finish(true, true);
                return undefined;
        }

        this.handleKey(msg.key);
        return undefined;
    }

    abstract view(): string;

    /** enter confirms only when this passes; otherwise enter is forwarded. */
    protected accept(): boolean {
        return true;
    }

    /** Called when the widget ends by esc or ctrl+c. */
    protected onAbort(): void {}

    protected resize(_columns: number, _rows: number): void {}

    protected abstract handleKey(key: string): void;

    private _finish(canceled: boolean, quit: boolean): Cmd {
        this._canceled = canceled;
        this._quit = quit;
        this._terminal = true;
        if (canceled) this.onAbort();

        getLogger().debug("widget finished", {
            widget: this.constructor.name,
            outcome: quit ? "quit" : canceled ? "canceled" : "confirmed",
        });
        return "quit";
    }
}
