/**
 * Raised by the constructor when the strategy functions are missing or a
 * sizing hint is out of range.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** Raised by `Cursor.next()` once every element has been returned. */
export class NoSuchElementError extends Error {
    constructor(message = 'Iteration exhausted.') {
        super(message);
        this.name = 'NoSuchElementError';
    }
}

/**
 * Thrown from a caller's `equals` or `hash` to say a value is outside the
 * domain the functions can process. Probing operations read it as "no match".
 */
export class IncompatibleElementError extends Error {
    constructor(message = 'Element is not compatible with this equivalence.') {
        super(message);
        this.name = 'IncompatibleElementError';
    }
}

/**
 * `TypeError` is what the runtime raises when a strategy touches a property of
 * `null`/`undefined` or a value of the wrong shape, so it counts as well.
 */
export function isIncompatibleInput(error: unknown): boolean {
    return error instanceof IncompatibleElementError || error instanceof TypeError;
}
