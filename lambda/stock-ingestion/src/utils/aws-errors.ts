/**
 * Inspect AWS SDK v3 errors without depending on each service's exception classes
 */

const TRANSIENT_ERROR_NAMES = new Set([
    'TimeoutError',
    'RequestTimeout',
    'RequestTimeoutException',
    'ThrottlingException',
    'Throttling',
    'SlowDown',
    'ServiceUnavailable',
    'InternalError',
    'InternalServerError',
    'ProvisionedThroughputExceededException',
    'RequestLimitExceeded'
]);

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

export function errorName(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
        return error.name;
    }
    return undefined;
}

export function httpStatusCode(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
        return undefined;
    }
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
        return metadata.httpStatusCode;
    }
    return undefined;
}

function networkCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Throttling, timeouts, 5xx and dropped connections are worth retrying
 */
export function isTransientAwsError(error: unknown): boolean {
    const name = errorName(error);
    if (name !== undefined && TRANSIENT_ERROR_NAMES.has(name)) {
        return true;
    }

    const code = networkCode(error);
    if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) {
        return true;
    }

    const status = httpStatusCode(error);
    return status !== undefined && status >= 500;
}

export function isConditionalCheckFailed(error: unknown): boolean {
    return errorName(error) === 'ConditionalCheckFailedException';
}
