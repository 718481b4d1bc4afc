// ══════════════════════════════════════════════════════════════════════════════
//  OUTCOME ERRORS
// ══════════════════════════════════════════════════════════════════════════════

/** The user pressed esc on a cancelable widget. Not a fault. */
export class CanceledError extends Error {
    constructor(message = "canceled") {
        super(message);
        this.name = "CanceledError";
    }
}

/**
 * The user pressed ctrl+c on a quitable widget. Callers should exit the
 * whole program, not just abandon the widget.
 */
export class QuitError extends Error {
    constructor(message = "quit") {
        super(message);
        this.name = "QuitError";
    }
}

// ══════════════════════════════════════════════════════════════════════════════
//  FATAL ERRORS
// ══════════════════════════════════════════════════════════════════════════════

/** The input source ended before the widget reached a terminal state. */
export class InputClosedError extends Error {
    constructor(message = "input closed before the widget finished") {
        super(message);
        this.name = "InputClosedError";
    }
}

export class WidgetConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "WidgetConfigError";
    }
}

export class ConfigError extends Error {
    constructor(
        message: string,
        readonly issues: string[] = [],
    ) {
        super(message);
        this.name = "ConfigError";
    }
}

export function isCanceled(err: unknown): err is CanceledError {
    return err instanceof CanceledError;
}

export function isQuit(err: unknown): err is QuitError {
    return err instanceof QuitError;
}
