/**
 * Alpha Vantage API client for fetching daily OHLCV bars
 *
 * Only TIME_SERIES_DAILY is used; intraday intervals are rejected as permanent
 * failures so the symbol's configuration gets fixed rather than retried.
 *
 * Rate Limit: 5 requests per minute on the free tier. Rate-limit and error
 * notes arrive with HTTP 200, so the body is inspected before it is returned.
 */

import axios, { AxiosInstance } from 'axios';
import { CycleCancelledError, PermanentFetchError, TransientFetchError } from '../errors';
import { AlphaVantageDatatype, BarInterval, FetchWindow, ProviderPayload } from '../types';
import { sleep, Sleeper } from '../utils/retry';
import { classifyRequestError, MarketDataProvider } from './market-data-provider';

export const ALPHA_VANTAGE_DAILY_FORMAT = 'alphavantage/time-series-daily';

// Header row timestamp,open,high,low,close,volume
export const CSV_OHLCV_FORMAT = 'csv/ohlcv-v1';

// Compact output holds the latest 100 trading days, roughly 140 calendar days
const COMPACT_HORIZON_MS = 140 * 86_400_000;

export interface AlphaVantageClientOptions {
    http?: AxiosInstance;
    timeoutMs?: number;
    requestsPerMinute?: number;
    baseUrl?: string;
    datatype?: AlphaVantageDatatype;
    now?: () => number;
    sleep?: Sleeper;
}

export class AlphaVantageClient implements MarketDataProvider {
    readonly name = 'alphavantage' as const;
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly rateLimit: number;
    private readonly datatype: AlphaVantageDatatype;
    private readonly rateLimitWindow = 60000; // 1 minute in milliseconds
    private readonly now: () => number;
    private readonly sleep: Sleeper;
    private requestCount = 0;
    private requestWindowStart: number;

    constructor(private readonly apiKey: string, options: AlphaVantageClientOptions = {}) {
        this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
        this.baseUrl = options.baseUrl ?? 'https://www.alphavantage.co/query';
        this.rateLimit = options.requestsPerMinute ?? 5;
        this.datatype = options.datatype ?? 'json';
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? sleep;
        this.requestWindowStart = this.now();
    }

    async fetchBars(symbol: string, interval: BarInterval, window: FetchWindow, signal?: AbortSignal): Promise<ProviderPayload> {
        if (interval !== '1d') {
            throw new PermanentFetchError(`Alpha Vantage client only supports 1d bars, ${symbol} is configured for ${interval}`);
        }

        await this.enforceRateLimit(signal);

        const outputsize = this.now() - window.start <= COMPACT_HORIZON_MS ? 'compact' : 'full';

        let body: string;
        try {
            const response = await this.http.get<string>(this.baseUrl, {
                params: {
                    function: 'TIME_SERIES_DAILY',
                    symbol,
                    apikey: this.apiKey,
                    outputsize,
                    ...(this.datatype === 'csv' ? { datatype: 'csv' } : {})
                },
                responseType: 'text',
                signal
            });
            body = typeof response.data === 'string' ? response.data : '';
        } catch (error) {
            if (signal?.aborted) {
                throw new CycleCancelledError();
            }
            throw classifyRequestError(this.name, symbol, error);
        }

        this.checkForProviderNotes(symbol, body);

        if (this.datatype === 'csv') {
            return { provider: this.name, format: CSV_OHLCV_FORMAT, contentType: 'text/csv', body };
        }
        return {
            provider: this.name,
            format: ALPHA_VANTAGE_DAILY_FORMAT,
            contentType: 'application/json',
            body
        };
    }

    /**
     * Alpha Vantage reports rate limits ('Note', 'Information') and bad requests
     * ('Error Message') inside a 200 response
     */
    private checkForProviderNotes(symbol: string, body: string): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch {
            // Not JSON: the normalizer reports it as a structural failure
            return;
        }

        if (typeof parsed !== 'object' || parsed === null) {
            return;
        }

        if ('Error Message' in parsed) {
            console.error(`Alpha Vantage API error for ${symbol}:`, parsed['Error Message']);
            throw new PermanentFetchError(`Alpha Vantage rejected request for ${symbol}: ${String(parsed['Error Message'])}`);
        }

        const note = 'Note' in parsed ? parsed.Note : 'Information' in parsed ? parsed.Information : undefined;
        if (note !== undefined) {
            console.warn('Alpha Vantage rate limit reached:', note);
            throw new TransientFetchError(`Alpha Vantage rate limit for ${symbol}: ${String(note)}`, this.rateLimitWindow);
        }
    }

    /**
     * Enforce rate limiting (requests per minute)
     * The slot is taken before any await, so concurrent callers cannot all
     * pass the check at once; callers over the limit wait for the next minute.
     */
    private async enforceRateLimit(signal?: AbortSignal): Promise<void> {
        while (true) {
            const now = this.now();
            if (now - this.requestWindowStart >= this.rateLimitWindow) {
                this.requestCount = 0;
                this.requestWindowStart = now;
            }

            if (this.requestCount < this.rateLimit) {
                this.requestCount++;
                return;
            }

            const waitTime = this.rateLimitWindow - (now - this.requestWindowStart);
            console.log(`Rate limit reached. Waiting ${waitTime}ms before next request`);
            await this.sleep(waitTime, signal);
        }
    }
}
