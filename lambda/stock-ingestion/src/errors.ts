/**
 * Error taxonomy for the ingestion pipeline
 *
 * Every error raised by a pipeline stage extends IngestionError so the
 * coordinator can decide on retries from `retryable` alone.
 */

export type IngestionErrorKind =
    | 'transient-fetch'
    | 'permanent-fetch'
    | 'structural-parse'
    | 'storage-unavailable'
    | 'watermark-conflict'
    | 'cancelled'
    | 'raw-record-not-found'
    | 'invalid-window'
    | 'symbol-busy'
    | 'configuration';

export class IngestionError extends Error {
    constructor(
        message: string,
        public readonly kind: IngestionErrorKind,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Rate limited, timed out, or the provider answered with a 5xx
 */
export class TransientFetchError extends IngestionError {
    constructor(message: string, public readonly retryAfterMs: number | null = null, options?: { cause?: unknown }) {
        super(message, 'transient-fetch', true, options);
    }
}

/**
 * Unknown symbol, malformed request, rejected credentials
 */
export class PermanentFetchError extends IngestionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'permanent-fetch', false, options);
    }
}

/**
 * Whole payload is not the expected container; retried like a transient fetch failure
 */
export class StructuralParseError extends IngestionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'structural-parse', true, options);
    }
}

export class StorageUnavailableError extends IngestionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'storage-unavailable', true, options);
    }
}

/**
 * Watermark changed underneath its single writer. Indicates a coordination bug.
 */
export class WatermarkConflictError extends IngestionError {
    constructor(message: string) {
        super(message, 'watermark-conflict', false);
    }
}

export class CycleCancelledError extends IngestionError {
    constructor(message: string = 'Cycle cancelled') {
        super(message, 'cancelled', false);
    }
}

export class RawRecordNotFoundError extends IngestionError {
    constructor(key: string) {
        super(`Raw record not found: ${key}`, 'raw-record-not-found', false);
    }
}

export class InvalidWindowError extends IngestionError {
    constructor(message: string) {
        super(message, 'invalid-window', false);
    }
}

/**
 * Another invocation holds the symbol's lease
 */
export class SymbolBusyError extends IngestionError {
    constructor(symbol: string) {
        super(`Symbol ${symbol} is being processed by another invocation`, 'symbol-busy', false);
    }
}

export class ConfigurationError extends IngestionError {
    constructor(message: string) {
        super(message, 'configuration', false);
    }
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function isRetryable(error: unknown): boolean {
    return error instanceof IngestionError && error.retryable;
}
