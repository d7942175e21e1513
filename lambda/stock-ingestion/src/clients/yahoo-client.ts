/**
 * Yahoo Finance client for fetching OHLCV bars
 *
 * Uses the Yahoo Finance v8 chart API directly via axios. The response body
 * is returned as received; parsing happens later in the normalizer.
 *
 * Rate Limit: No official limit, but we add a delay between requests to be respectful
 */

import axios, { AxiosInstance } from 'axios';
import { CycleCancelledError, PermanentFetchError } from '../errors';
import { BarInterval, FetchWindow, ProviderPayload } from '../types';
import { sleep } from '../utils/retry';
import { classifyRequestError, MarketDataProvider } from './market-data-provider';

export const YAHOO_CHART_FORMAT = 'yahoo-chart/v8';

const YAHOO_INTERVALS: Record<BarInterval, string> = {
    '1m': '1m',
    '5m': '5m',
    '15m': '15m',
    '30m': '30m',
    '1h': '60m',
    '1d': '1d',
    '1wk': '1wk'
};

export interface YahooClientOptions {
    http?: AxiosInstance;
    timeoutMs?: number;
    requestDelay?: number;   // Delay between requests in milliseconds
    baseUrl?: string;
}

export class YahooChartClient implements MarketDataProvider {
    readonly name = 'yahoo' as const;
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly requestDelay: number;

    constructor(options: YahooClientOptions = {}) {
        this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
        this.baseUrl = options.baseUrl ?? 'https://query1.finance.yahoo.com/v8/finance/chart';
        this.requestDelay = options.requestDelay ?? 100;
    }

    /**
     * Fetch bars for a symbol over [window.start, window.end)
     * @param symbol Stock ticker symbol (e.g., 'AAPL', 'MSFT', 'SPY')
     */
    async fetchBars(symbol: string, interval: BarInterval, window: FetchWindow, signal?: AbortSignal): Promise<ProviderPayload> {
        await sleep(this.requestDelay, signal);

        const period1 = Math.floor(window.start / 1000);
        const period2 = Math.ceil(window.end / 1000);
        const url = `${this.baseUrl}/${encodeURIComponent(symbol)}`;

        try {
            const response = await this.http.get<string>(url, {
                params: {
                    period1,
                    period2,
                    interval: YAHOO_INTERVALS[interval],
                    includePrePost: false
                },
                headers: {
                    'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',
                    'Accept': 'application/json'
                },
                responseType: 'text',
                signal
            });

            if (typeof response.data !== 'string' || response.data.length === 0) {
                throw new PermanentFetchError(`Empty response from Yahoo Finance for ${symbol}`);
            }

            return {
                provider: this.name,
                format: YAHOO_CHART_FORMAT,
                contentType: 'application/json',
                body: response.data
            };
        } catch (error) {
            if (signal?.aborted) {
                throw new CycleCancelledError();
            }
            throw classifyRequestError(this.name, symbol, error);
        }
    }
}
