/**
 * The Table Store could not be read or written
 *
 * Aborts the current request; the HTTP layer answers 503.
 */
export class StoreUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreUnavailableError';
    }
}
