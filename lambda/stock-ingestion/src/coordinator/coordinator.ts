/**
 * Ingestion coordinator
 *
 * Decides which window each symbol needs next, runs fetch -> raw store ->
 * normalize -> write for it, and owns the watermark and run records.
 *
 * Single-flight per symbol: an in-process KeyedMutex serializes cycles of the
 * same symbol, and a lease in the state store keeps overlapping invocations
 * from running it at the same time.
 */

import { v4 as uuidv4 } from 'uuid';
import { AlertDispatcher } from '../alerts';
import {
    ConfigurationError,
    CycleCancelledError,
    getErrorMessage,
    IngestionError,
    InvalidWindowError,
    isRetryable,
    SymbolBusyError,
    TransientFetchError,
    WatermarkConflictError
} from '../errors';
import { MarketDataFetcher } from '../fetcher';
import { normalize } from '../normalizer/normalizer';
import { RawStore } from '../raw-store/raw-store';
import { StateStore } from '../state/state-store';
import {
    BackfillResult,
    CycleOptions,
    DueWindow,
    FailurePolicy,
    FetchWindow,
    RetryPolicy,
    RunRecord,
    SymbolConfig,
    SymbolStatus,
    TickSummary,
    WatermarkRecord
} from '../types';
import { calculateBackoff, DEFAULT_RETRY_POLICY, sleep, Sleeper } from '../utils/retry';
import { formatWindow, nextWindow, toIso } from '../utils/time';
import { Warehouse } from '../warehouse/warehouse';
import { KeyedMutex, runWithConcurrency } from './concurrency';

export type Fetcher = Pick<MarketDataFetcher, 'fetch'>;

export interface CoordinatorOptions {
    retry: RetryPolicy;
    failurePolicy: FailurePolicy;
    workerConcurrency: number;
    maxWindowsPerTick: number;
    closedWindowsOnly: boolean;
    leaseTtlMs: number;
}

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
    retry: DEFAULT_RETRY_POLICY,
    failurePolicy: 'block',
    workerConcurrency: 4,
    maxWindowsPerTick: 24,
    closedWindowsOnly: false,
    leaseTtlMs: 15 * 60 * 1000
};

export interface CoordinatorDeps {
    symbols: SymbolConfig[];
    fetcher: Fetcher;
    rawStore: RawStore;
    warehouse: Warehouse;
    state: StateStore;
    alerts: AlertDispatcher;
    options?: Partial<CoordinatorOptions>;
    clock?: () => number;
    sleeper?: Sleeper;
    random?: () => number;
    ownerId?: string;
}

const BACKFILL_PROGRESS_EVERY = 10;

// Cadences of a day or more only ever take full windows
const CLOSED_CADENCE_MS = 86_400_000;

function isCommitted(record: RunRecord): boolean {
    return record.status === 'success' || record.status === 'partial';
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CycleCancelledError();
    }
}

export class Coordinator {
    private readonly symbols: Map<string, SymbolConfig>;
    private readonly fetcher: Fetcher;
    private readonly rawStore: RawStore;
    private readonly warehouse: Warehouse;
    private readonly state: StateStore;
    private readonly alerts: AlertDispatcher;
    private readonly options: CoordinatorOptions;
    private readonly clock: () => number;
    private readonly sleeper: Sleeper;
    private readonly random: () => number;
    private readonly ownerId: string;
    private readonly mutex = new KeyedMutex();

    constructor(deps: CoordinatorDeps) {
        this.symbols = new Map(deps.symbols.map(symbol => [symbol.symbol, symbol]));
        this.fetcher = deps.fetcher;
        this.rawStore = deps.rawStore;
        this.warehouse = deps.warehouse;
        this.state = deps.state;
        this.alerts = deps.alerts;
        this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...deps.options };
        this.clock = deps.clock ?? Date.now;
        this.sleeper = deps.sleeper ?? sleep;
        this.random = deps.random ?? Math.random;
        this.ownerId = deps.ownerId ?? uuidv4();
    }

    /**
     * Next window for every enabled symbol, in configuration order.
     * Symbols with a cycle in flight or a blocked window are left out;
     * a symbol that is behind gets only its earliest window.
     */
    async scheduleDue(now: number = this.clock()): Promise<DueWindow[]> {
        const due: DueWindow[] = [];

        for (const symbol of this.symbols.values()) {
            if (!symbol.enabled || this.mutex.isLocked(symbol.symbol)) {
                continue;
            }

            const watermark = await this.currentWatermark(symbol);
            if (watermark.blockedWindow) {
                console.warn(`${symbol.symbol} is blocked on failed window ${formatWindow(watermark.blockedWindow)}`);
                continue;
            }

            const window = nextWindow(watermark.position, symbol.cadenceMs, now, this.closedOnly(symbol));
            if (window) {
                due.push({ symbol, window });
            }
        }

        return due;
    }

    /**
     * Run one window end to end, retrying retryable failures with backoff.
     * Every attempt leaves a RunRecord; the record of the last attempt is returned.
     * @throws SymbolBusyError when another invocation holds the symbol
     * @throws WatermarkConflictError when the watermark changed underneath this writer
     */
    async runCycle(symbolName: string, window: FetchWindow, options: CycleOptions = {}): Promise<RunRecord> {
        const symbol = this.getSymbol(symbolName);
        if (window.end <= window.start) {
            throw new InvalidWindowError(`Window ${formatWindow(window)} for ${symbolName} is empty`);
        }

        return this.exclusive(symbol.symbol, () => this.runLocked(symbol, window, options.signal));
    }

    /**
     * Schedule due windows and run them on a bounded pool: symbols in parallel,
     * each symbol's windows one after another, up to maxWindowsPerTick per symbol.
     */
    async tick(now: number = this.clock(), options: CycleOptions = {}): Promise<TickSummary> {
        const due = await this.scheduleDue(now);
        const summary: TickSummary = { scheduled: due.length, runs: [], busySymbols: [], errors: [] };

        console.log(`Tick at ${toIso(now)}: ${due.length} symbol(s) due`);

        const perSymbol = await runWithConcurrency(due, this.options.workerConcurrency, async ({ symbol, window }) => {
            const runs: RunRecord[] = [];
            let current: FetchWindow | null = window;

            try {
                for (let i = 0; current && i < this.options.maxWindowsPerTick; i++) {
                    const record = await this.runCycle(symbol.symbol, current, options);
                    runs.push(record);

                    if (!isCommitted(record) || options.signal?.aborted) {
                        break;
                    }
                    current = nextWindow(current.end, symbol.cadenceMs, now, this.closedOnly(symbol));
                }
            } catch (error) {
                if (error instanceof SymbolBusyError) {
                    summary.busySymbols.push(symbol.symbol);
                } else {
                    console.error(`Cycle for ${symbol.symbol} aborted:`, getErrorMessage(error));
                    summary.errors.push(`${symbol.symbol}: ${getErrorMessage(error)}`);
                }
            }

            return runs;
        });

        for (const runs of perSymbol) {
            summary.runs.push(...runs);
        }

        const failed = summary.runs.filter(run => !isCommitted(run)).length;
        console.log(`Tick complete: ${summary.runs.length - failed} window(s) committed, ${failed} not committed, ${summary.busySymbols.length} busy`);

        return summary;
    }

    /**
     * Run successive windows for one symbol until its watermark reaches `until`,
     * stopping at the first window that does not commit
     */
    async backfill(symbolName: string, until: number = this.clock(), options: CycleOptions = {}): Promise<BackfillResult> {
        const symbol = this.getSymbol(symbolName);
        const limit = Math.min(until, this.clock());
        const result: BackfillResult = {
            symbol: symbol.symbol,
            windowsCommitted: 0,
            watermark: '',
            completed: false,
            errors: []
        };

        console.log(`Starting backfill for ${symbol.symbol} until ${toIso(limit)}`);

        while (true) {
            const watermark = await this.currentWatermark(symbol);
            result.watermark = toIso(watermark.position);

            if (watermark.blockedWindow) {
                result.errors.push(`Blocked on failed window ${formatWindow(watermark.blockedWindow)}`);
                break;
            }
            if (options.signal?.aborted) {
                result.errors.push('Backfill cancelled before completion');
                break;
            }

            const window = nextWindow(watermark.position, symbol.cadenceMs, limit, this.closedOnly(symbol));
            if (!window) {
                result.completed = true;
                break;
            }

            const record = await this.runCycle(symbol.symbol, window, options);
            if (!isCommitted(record)) {
                result.errors.push(`${formatWindow(window)}: ${record.status}${record.errorMessage ? ` (${record.errorMessage})` : ''}`);
                if (record.skipped) {
                    continue;
                }
                break;
            }

            result.windowsCommitted++;
            if (result.windowsCommitted % BACKFILL_PROGRESS_EVERY === 0) {
                console.log(`Backfill progress for ${symbol.symbol}: ${result.windowsCommitted} windows, watermark ${toIso(window.end)}`);
            }
        }

        const final = await this.currentWatermark(symbol);
        result.watermark = toIso(final.position);
        console.log(`Backfill for ${symbol.symbol} ${result.completed ? 'completed' : 'stopped'}: ${result.windowsCommitted} windows committed, watermark ${result.watermark}`);

        return result;
    }

    /**
     * Re-run a symbol's blocked window. Success unblocks the symbol; another
     * failure is handled by the failure policy again.
     */
    async retryFailedWindow(symbolName: string, options: CycleOptions = {}): Promise<RunRecord> {
        const symbol = this.getSymbol(symbolName);
        const watermark = await this.currentWatermark(symbol);
        if (!watermark.blockedWindow) {
            throw new InvalidWindowError(`${symbol.symbol} has no failed window to retry`);
        }

        console.log(`Retrying failed window ${formatWindow(watermark.blockedWindow)} for ${symbol.symbol}`);
        return this.runCycle(symbol.symbol, watermark.blockedWindow, options);
    }

    /**
     * Give up on a symbol's blocked window: move the watermark past it and record the gap
     */
    async skipFailedWindow(symbolName: string): Promise<WatermarkRecord> {
        const symbol = this.getSymbol(symbolName);

        return this.exclusive(symbol.symbol, async () => {
            const watermark = await this.currentWatermark(symbol);
            const blocked = watermark.blockedWindow;
            if (!blocked) {
                throw new InvalidWindowError(`${symbol.symbol} has no failed window to skip`);
            }

            const previous = await this.state.listRunRecords(symbol.symbol, blocked);
            const now = toIso(this.clock());
            await this.state.putRunRecord({
                ...this.newRunRecord(symbol.symbol, blocked, previous.length + 1),
                status: 'failed',
                finishedAt: now,
                errorKind: 'skipped',
                errorMessage: 'Window skipped by operator',
                skipped: true
            });

            const saved = await this.saveWatermark(watermark, Math.max(watermark.position, blocked.end), null);
            console.warn(`Skipped failed window ${formatWindow(blocked)} for ${symbol.symbol}; watermark now ${toIso(saved.position)}`);
            return saved;
        });
    }

    /**
     * Watermark, blocked window, latest run and warehouse row count per configured symbol
     */
    async status(): Promise<SymbolStatus[]> {
        const statuses: SymbolStatus[] = [];

        for (const symbol of this.symbols.values()) {
            const stored = await this.state.getWatermark(symbol.symbol);
            const lastRun = await this.state.latestRunRecord(symbol.symbol);
            const warehouseRows = await this.warehouse.countRows(symbol.symbol);

            statuses.push({
                symbol: symbol.symbol,
                enabled: symbol.enabled,
                watermark: stored ? toIso(stored.position) : null,
                blockedWindow: stored?.blockedWindow ?? null,
                lastRun,
                warehouseRows
            });
        }

        return statuses;
    }

    /**
     * A partial window of a daily or longer cadence would land a bar that is
     * still forming and then move the watermark past it
     */
    private closedOnly(symbol: SymbolConfig): boolean {
        return this.options.closedWindowsOnly || symbol.cadenceMs >= CLOSED_CADENCE_MS;
    }

    private getSymbol(symbolName: string): SymbolConfig {
        const symbol = this.symbols.get(symbolName);
        if (!symbol) {
            throw new ConfigurationError(`Unknown symbol: ${symbolName}`);
        }
        return symbol;
    }

    private async currentWatermark(symbol: SymbolConfig): Promise<WatermarkRecord> {
        const stored = await this.state.getWatermark(symbol.symbol);
        return stored ?? {
            symbol: symbol.symbol,
            position: symbol.startFrom,
            version: 0,
            blockedWindow: null,
            updatedAt: toIso(symbol.startFrom)
        };
    }

    /**
     * Hold the in-process lock and the cross-invocation lease for a symbol while task runs
     */
    private exclusive<T>(symbol: string, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(symbol, async () => {
            const acquired = await this.state.acquireLease(symbol, this.ownerId, this.options.leaseTtlMs, this.clock());
            if (!acquired) {
                throw new SymbolBusyError(symbol);
            }

            try {
                return await task();
            } finally {
                await this.releaseLease(symbol);
            }
        });
    }

    private async releaseLease(symbol: string): Promise<void> {
        try {
            await this.state.releaseLease(symbol, this.ownerId);
        } catch (error) {
            // The lease expires on its own after leaseTtlMs
            console.error(`Failed to release lease for ${symbol}:`, getErrorMessage(error));
        }
    }

    private async runLocked(symbol: SymbolConfig, window: FetchWindow, signal?: AbortSignal): Promise<RunRecord> {
        const watermark = await this.currentWatermark(symbol);
        if (window.start > watermark.position) {
            throw new InvalidWindowError(
                `Window ${formatWindow(window)} for ${symbol.symbol} starts after watermark ${toIso(watermark.position)}`
            );
        }

        const { retry } = this.options;
        let last: RunRecord | null = null;

        for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
            const running = this.newRunRecord(symbol.symbol, window, attempt);
            await this.state.putRunRecord(running);

            try {
                return await this.attempt(symbol, window, running, signal);
            } catch (error) {
                const cancelled = error instanceof CycleCancelledError;
                const retryable = !cancelled && isRetryable(error);
                const exhausted = !retryable || attempt >= retry.maxAttempts;
                const skipped = !cancelled && exhausted && this.options.failurePolicy === 'skip';

                last = {
                    ...running,
                    status: cancelled ? 'cancelled' : 'failed',
                    finishedAt: toIso(this.clock()),
                    errorKind: error instanceof IngestionError ? error.kind : 'unexpected',
                    errorMessage: getErrorMessage(error),
                    retryable,
                    skipped
                };
                await this.state.putRunRecord(last);

                if (error instanceof WatermarkConflictError) {
                    await this.alerts.notify({
                        severity: 'critical',
                        symbol: symbol.symbol,
                        window,
                        title: 'Watermark conflict',
                        detail: error.message
                    });
                    throw error;
                }

                if (cancelled) {
                    console.warn(`${symbol.symbol} ${formatWindow(window)} cancelled on attempt ${attempt}`);
                    return last;
                }

                if (exhausted) {
                    await this.applyFailurePolicy(symbol, window, last);
                    return last;
                }

                const delay = this.retryDelay(attempt, error);
                console.warn(`${symbol.symbol} ${formatWindow(window)} attempt ${attempt} failed (${last.errorKind}): ${last.errorMessage}. Retrying in ${Math.round(delay)}ms...`);

                try {
                    await this.sleeper(delay, signal);
                } catch (sleepError) {
                    if (sleepError instanceof CycleCancelledError) {
                        console.warn(`${symbol.symbol} ${formatWindow(window)} cancelled while waiting to retry`);
                        return last;
                    }
                    throw sleepError;
                }
            }
        }

        // maxAttempts is at least 1, so the loop always returns
        throw new InvalidWindowError(`No attempts were made for ${symbol.symbol} ${formatWindow(window)}`);
    }

    private async attempt(
        symbol: SymbolConfig,
        window: FetchWindow,
        running: RunRecord,
        signal?: AbortSignal
    ): Promise<RunRecord> {
        throwIfAborted(signal);
        const ref = await this.fetcher.fetch(symbol, window, running.runId, signal);

        throwIfAborted(signal);
        const raw = await this.rawStore.get(ref);
        const { rows, rejects } = normalize(raw, window);

        throwIfAborted(signal);
        const written = await this.warehouse.write(rows, { signal });

        const watermark = await this.currentWatermark(symbol);
        await this.saveWatermark(watermark, Math.max(watermark.position, window.end), null);

        const record: RunRecord = {
            ...running,
            status: rejects.length > 0 ? 'partial' : 'success',
            finishedAt: toIso(this.clock()),
            rawKey: ref.key,
            rowsWritten: written.written,
            rowsSkipped: written.skipped,
            rejectCount: rejects.length
        };
        await this.state.putRunRecord(record);

        console.log(`${symbol.symbol} ${formatWindow(window)} committed: ${written.written} rows written, ${written.skipped} skipped, ${rejects.length} rejected`);
        return record;
    }

    private retryDelay(attempt: number, error: unknown): number {
        const { retry } = this.options;
        const backoff = calculateBackoff(attempt, retry, this.random);
        if (error instanceof TransientFetchError && error.retryAfterMs !== null) {
            return Math.max(backoff, Math.min(error.retryAfterMs, retry.maxDelayMs));
        }
        return backoff;
    }

    private async applyFailurePolicy(symbol: SymbolConfig, window: FetchWindow, record: RunRecord): Promise<void> {
        const policy = this.options.failurePolicy;
        const watermark = await this.currentWatermark(symbol);

        if (policy === 'skip') {
            await this.saveWatermark(watermark, Math.max(watermark.position, window.end), null);
        } else {
            await this.saveWatermark(watermark, watermark.position, window);
        }

        await this.alerts.notify({
            severity: 'critical',
            symbol: symbol.symbol,
            window,
            title: policy === 'skip' ? 'Window failed and was skipped' : 'Window failed; symbol blocked',
            detail: `attempt ${record.attempt} ${record.errorKind}: ${record.errorMessage}`
        });
    }

    /**
     * Persist a new watermark position. Positions never move backward.
     */
    private async saveWatermark(current: WatermarkRecord, position: number, blockedWindow: FetchWindow | null): Promise<WatermarkRecord> {
        if (position < current.position) {
            throw new WatermarkConflictError(
                `Refusing to move ${current.symbol} watermark backward from ${toIso(current.position)} to ${toIso(position)}`
            );
        }

        return this.state.saveWatermark({
            symbol: current.symbol,
            position,
            blockedWindow,
            updatedAt: toIso(this.clock())
        }, current.version);
    }

    private newRunRecord(symbol: string, window: FetchWindow, attempt: number): RunRecord {
        return {
            runId: uuidv4(),
            symbol,
            window,
            attempt,
            status: 'running',
            startedAt: toIso(this.clock()),
            finishedAt: null,
            errorKind: null,
            errorMessage: null,
            retryable: false,
            rawKey: null,
            rowsWritten: 0,
            rowsSkipped: 0,
            rejectCount: 0,
            skipped: false
        };
    }
}
