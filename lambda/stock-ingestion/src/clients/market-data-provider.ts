/**
 * Provider contract and the HTTP failure classification shared by the provider clients
 */

import axios from 'axios';
import { PermanentFetchError, TransientFetchError } from '../errors';
import { BarInterval, FetchWindow, ProviderName, ProviderPayload } from '../types';

export interface MarketDataProvider {
    readonly name: ProviderName;

    /**
     * Fetch bars for a symbol over a window and return the payload untouched.
     * Throws TransientFetchError or PermanentFetchError, or CycleCancelledError
     * once the signal aborts.
     */
    fetchBars(symbol: string, interval: BarInterval, window: FetchWindow, signal?: AbortSignal): Promise<ProviderPayload>;
}

/**
 * Get retry-after time from an HTTP error response
 * @returns Wait time in milliseconds, or null when the provider did not say
 */
export function getRetryAfter(error: unknown): number | null {
    if (axios.isAxiosError(error) && error.response) {
        const retryAfter = error.response.headers['retry-after'];
        if (typeof retryAfter === 'string') {
            const seconds = parseInt(retryAfter, 10);
            if (!isNaN(seconds)) {
                return seconds * 1000;
            }
        }
    }
    return null;
}

/**
 * Translate a failed request into the pipeline's fetch error taxonomy.
 * Rate limits, timeouts, connection failures and 5xx responses are transient;
 * any other HTTP status means the request itself is wrong.
 */
export function classifyRequestError(provider: ProviderName, symbol: string, error: unknown): TransientFetchError | PermanentFetchError {
    if (error instanceof TransientFetchError || error instanceof PermanentFetchError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const detail = `${provider} request for ${symbol} failed: ${error.message}`;

        if (status === 429) {
            return new TransientFetchError(`${detail} (rate limited)`, getRetryAfter(error), { cause: error });
        }
        if (status === undefined || error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new TransientFetchError(detail, null, { cause: error });
        }
        if (status >= 500 && status < 600) {
            return new TransientFetchError(detail, null, { cause: error });
        }
        if (status === 403) {
            console.error(`403 Access Denied from ${provider} - API key may be invalid or blocked`);
        }
        return new PermanentFetchError(detail, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransientFetchError(`${provider} request for ${symbol} failed: ${message}`, null, { cause: error });
}
