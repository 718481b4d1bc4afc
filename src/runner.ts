import { InputClosedError } from "./errors";
import { getLogger } from "./logger";
import { errorOrValidate, type Outcome, toOutcome } from "./outcome";
import { type RunIO, terminalIO } from "./terminal";
import type { IModel } from "./widget";

/**
 * Drive a widget until it reaches a terminal state.
 *
 * Renders once up front and after every message that leaves the widget
 * running; the terminal message is not rendered. Resolves with the outcome,
 * or rejects with the loop's own failure (including {@link InputClosedError}
 * when input ends first).
 */
export async function run<V>(widget: IModel<V>, io: RunIO = terminalIO()): Promise<Outcome<V>> {
    try {
        io.display.start();
        widget.init();
        io.display.render(widget.view());

        for (;;) {
            const msg = await io.input.next();
            if (msg === undefined) throw new InputClosedError();

            if (widget.update(msg) === "quit") break;
            io.display.render(widget.view());
        }
    } finally {
        io.display.stop();
        io.input.close();
    }

    const outcome = toOutcome(widget);
    getLogger().debug("run finished", { outcome: outcome.kind });
    return outcome;
}

/**
 * Run a widget and return its confirmed value. Throws the loop failure,
 * QuitError or CanceledError, in that order of precedence.
 */
export async function prompt<V>(widget: IModel<V>, io?: RunIO): Promise<V> {
    let failure: unknown;
    try {
        await run(widget, io ?? terminalIO());
    } catch (err) {
        getLogger().error("run failed", { error: err instanceof Error ? err.message : String(err) });
        failure = err;
    }

    const err = errorOrValidate(failure, widget);
    if (err) throw err;
    return widget.value();
}
