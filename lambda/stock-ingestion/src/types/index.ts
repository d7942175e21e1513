/**
 * TypeScript interfaces and types for stock data ingestion
 */

export type ProviderName = 'yahoo' | 'alphavantage';

/**
 * Bar sizes the providers can be asked for
 */
export type BarInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '1d' | '1wk';

export interface SymbolConfig {
    symbol: string;
    cadence: string;     // As configured, e.g. '1d'
    cadenceMs: number;   // Window length in milliseconds
    interval: BarInterval;
    enabled: boolean;
    provider: ProviderName;
    startFrom: number;   // Initial watermark (epoch ms) when none is stored
}

/**
 * Half-open interval [start, end) in epoch milliseconds
 */
export interface FetchWindow {
    start: number;
    end: number;
}

export interface DueWindow {
    symbol: SymbolConfig;
    window: FetchWindow;
}

export interface RecordRef {
    key: string;
    symbol: string;
    window: FetchWindow;
    attemptId: string;
}

/**
 * Payload exactly as returned by the provider, plus what is needed to parse it later
 */
export interface RawRecord {
    ref: RecordRef;
    provider: ProviderName;
    format: string;       // Versioned payload format, e.g. 'yahoo-chart/v8'
    contentType: string;
    fetchedAt: string;    // ISO 8601
    body: string;
    sha256: string;
}

/**
 * Provider response before it is landed in the raw store
 */
export interface ProviderPayload {
    provider: ProviderName;
    format: string;
    contentType: string;
    body: string;
}

export interface NormalizedRow {
    symbol: string;
    timestamp: Date;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/**
 * One provider entry as found in the payload, before validation
 */
export interface RawEntry {
    index: number;
    timestamp: unknown;
    open: unknown;
    high: unknown;
    low: unknown;
    close: unknown;
    volume: unknown;
}

export interface ValidationReject {
    entry: RawEntry;
    reason: string;
}

export interface NormalizeResult {
    rows: NormalizedRow[];
    rejects: ValidationReject[];
}

export interface WriteResult {
    written: number;
    skipped: number;
}

export interface WatermarkRecord {
    symbol: string;
    position: number;                   // End of the last committed (or skipped) window
    version: number;
    blockedWindow: FetchWindow | null;  // Set when a window exhausted retries under the block policy
    updatedAt: string;
}

export type RunStatus = 'running' | 'success' | 'partial' | 'failed' | 'cancelled';

export interface RunRecord {
    runId: string;
    symbol: string;
    window: FetchWindow;
    attempt: number;
    status: RunStatus;
    startedAt: string;
    finishedAt: string | null;
    errorKind: string | null;
    errorMessage: string | null;
    retryable: boolean;
    rawKey: string | null;
    rowsWritten: number;
    rowsSkipped: number;
    rejectCount: number;
    skipped: boolean;   // Gap recorded under the skip policy
}

export type FailurePolicy = 'block' | 'skip';

/**
 * Alpha Vantage response encoding: 'json' keeps the native time series object,
 * 'csv' asks for the plain OHLCV table
 */
export type AlphaVantageDatatype = 'json' | 'csv';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
}

export interface CycleOptions {
    signal?: AbortSignal;
}

export interface TickSummary {
    scheduled: number;
    runs: RunRecord[];
    busySymbols: string[];
    errors: string[];
}

export interface BackfillResult {
    symbol: string;
    windowsCommitted: number;
    watermark: string;
    completed: boolean;
    errors: string[];
}

export interface SymbolStatus {
    symbol: string;
    enabled: boolean;
    watermark: string | null;
    blockedWindow: FetchWindow | null;
    lastRun: RunRecord | null;
    warehouseRows: number;
}

export interface IngestionConfig {
    environment: string;
    awsRegion: string;
    rawBucket: string;
    rawPrefix: string;
    watermarkTable: string;
    runRecordTable: string;
    postgres: {
        host: string;
        port: number;
        database: string;
        user: string;
        passwordSecret: string | null;
        password: string | null;
        table: string;
    };
    defaultProvider: ProviderName;
    alphaVantageKeyParameter: string | null;
    alphaVantageDatatype: AlphaVantageDatatype;
    fetchTimeoutMs: number;
    retry: RetryPolicy;
    failurePolicy: FailurePolicy;
    workerConcurrency: number;
    maxWindowsPerTick: number;
    closedWindowsOnly: boolean;
    defaultStart: number;
    leaseTtlMs: number;
    cancelMarginMs: number;
    alertTopicArn: string | null;
}
