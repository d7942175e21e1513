/**
 * Fetcher: one provider call per attempt, landed verbatim in the raw store
 */

import { v4 as uuidv4 } from 'uuid';
import { MarketDataProvider } from './clients/market-data-provider';
import { ConfigurationError } from './errors';
import { RawStore, sha256 } from './raw-store/raw-store';
import { FetchWindow, ProviderName, RecordRef, SymbolConfig } from './types';
import { formatWindow } from './utils/time';

export type ProviderRegistry = Partial<Record<ProviderName, MarketDataProvider>>;

export class MarketDataFetcher {
    constructor(
        private readonly providers: ProviderRegistry,
        private readonly rawStore: RawStore,
        private readonly now: () => number = Date.now
    ) { }

    /**
     * Fetch a window for a symbol and persist exactly one new raw record.
     * Provider failures propagate as TransientFetchError or PermanentFetchError;
     * nothing is written to the raw store in that case.
     */
    async fetch(symbol: SymbolConfig, window: FetchWindow, attemptId: string = uuidv4(), signal?: AbortSignal): Promise<RecordRef> {
        const provider = this.providers[symbol.provider];
        if (!provider) {
            throw new ConfigurationError(`No ${symbol.provider} client configured for ${symbol.symbol}`);
        }

        console.log(`Fetching ${symbol.symbol} ${formatWindow(window)} from ${provider.name} (${symbol.interval} bars)`);

        const payload = await provider.fetchBars(symbol.symbol, symbol.interval, window, signal);
        const fetchedAt = new Date(this.now()).toISOString();

        const ref = await this.rawStore.put({
            ref: { key: '', symbol: symbol.symbol, window, attemptId },
            provider: payload.provider,
            format: payload.format,
            contentType: payload.contentType,
            fetchedAt,
            body: payload.body,
            sha256: sha256(payload.body)
        });

        console.log(`Landed ${payload.body.length} bytes for ${symbol.symbol} at ${ref.key}`);
        return ref;
    }
}
