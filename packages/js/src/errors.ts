/**
 * Error types raised while building or serializing boxes.
 *
 * Malformed input shapes surface as the built-in `TypeError`, arity and
 * lookup failures as `RangeError`, which `FunctionalSyntaxError` extends.
 */

/**
 * Raised when a box is asked for a representation it does not have, such as
 * the bare RDF node of an {@link Annotation}, or for a construct the emitter
 * declines to approximate.
 */
export class NotImplementedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NotImplementedError';
    }
}

/** Raised when an identifier cannot be written into functional-style syntax. */
export class FunctionalSyntaxError extends RangeError {
    readonly value: string;

    constructor(value: string, reason: string) {
        super(`Cannot serialize ${JSON.stringify(value)} as functional OWL: ${reason}`);
        this.name = 'FunctionalSyntaxError';
        this.value = value;
    }
}
