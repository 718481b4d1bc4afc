import { CanceledError, QuitError } from "./errors";

/** Anything that can report how it finished. */
export interface StandardWidget {
    canceled(): boolean;
    quit(): boolean;
}

export type Outcome<V> =
    | { kind: "confirmed"; value: V }
    | { kind: "canceled" }
    | { kind: "quit" };

/**
 * Single translation point from (loop error, widget flags) to a result.
 *
 * Precedence: a raw loop error wins, then quit, then cancel. `undefined`
 * means the widget was confirmed and its value can be read.
 */
export function errorOrValidate(err: unknown, w: StandardWidget): Error | undefined {
    if (err !== undefined && err !== null) {
        return err instanceof Error ? err : new Error(String(err));
    }
    if (w.quit()) return new QuitError();
    if (w.canceled()) return new CanceledError();
    return undefined;
}

/** Read the outcome of a widget whose run loop has ended. */
export function toOutcome<V>(w: StandardWidget & { value(): V }): Outcome<V> {
    if (w.quit()) return { kind: "quit" };
    if (w.canceled()) return { kind: "canceled" };
    return { kind: "confirmed", value: w.value() };
}
