/**
 * Postgres warehouse writer
 *
 * One transaction per write: BEGIN, chunked INSERT ... ON CONFLICT (symbol, ts)
 * DO UPDATE, COMMIT. Any failure, or an abort before COMMIT, rolls back.
 */

import { Pool, PoolClient } from 'pg';
import { ConfigurationError, CycleCancelledError, getErrorMessage } from '../errors';
import { CycleOptions, NormalizedRow, WriteResult } from '../types';
import { withStorageRetry } from '../utils/retry';
import { prepareBatch, Warehouse } from './warehouse';

const COLUMNS_PER_ROW = 7;
const DEFAULT_CHUNK_SIZE = 500;

// Connection loss, shutdown, too many connections, serialization failure, deadlock
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03', '53300', '40001', '40P01']);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

export interface PostgresWarehouseOptions {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string | null;
    table: string;
    chunkSize?: number;
    pool?: Pool;
}

export function isTransientPgError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('code' in error) || typeof error.code !== 'string') {
        return false;
    }
    return error.code.startsWith('08') || TRANSIENT_SQLSTATES.has(error.code) || TRANSIENT_NETWORK_CODES.has(error.code);
}

export class PostgresWarehouse implements Warehouse {
    private readonly pool: Pool;
    private readonly table: string;
    private readonly chunkSize: number;

    constructor(options: PostgresWarehouseOptions) {
        if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(options.table)) {
            throw new ConfigurationError(`Invalid warehouse table name: '${options.table}'`);
        }

        this.table = options.table;
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        this.pool = options.pool ?? new Pool({
            host: options.host,
            port: options.port,
            database: options.database,
            user: options.user,
            password: options.password ?? undefined,
            max: 4,
            statement_timeout: 30_000
        });

        this.pool.on('error', (error: Error) => {
            console.error('Idle Postgres client error:', error.message);
        });
    }

    async write(rows: NormalizedRow[], options: CycleOptions = {}): Promise<WriteResult> {
        const batch = prepareBatch(rows);
        if (batch.rows.length === 0) {
            return { written: 0, skipped: batch.skipped };
        }

        await withStorageRetry(`Postgres write to ${this.table}`, () => this.writeTransaction(batch.rows, options.signal), {
            isTransient: isTransientPgError
        });

        return { written: batch.rows.length, skipped: batch.skipped };
    }

    private async writeTransaction(rows: NormalizedRow[], signal?: AbortSignal): Promise<void> {
        throwIfAborted(signal);

        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');

            for (let i = 0; i < rows.length; i += this.chunkSize) {
                throwIfAborted(signal);
                await this.upsertChunk(client, rows.slice(i, i + this.chunkSize));
            }

            throwIfAborted(signal);
            await client.query('COMMIT');
        } catch (error) {
            await rollback(client);
            throw error;
        } finally {
            client.release();
        }
    }

    private async upsertChunk(client: PoolClient, rows: NormalizedRow[]): Promise<void> {
        const placeholders: string[] = [];
        const values: Array<string | number | Date> = [];

        rows.forEach((row, i) => {
            const base = i * COLUMNS_PER_ROW;
            placeholders.push(`($${base + 1},$${base + 2},$${base + 3},$${base + 4},$${base + 5},$${base + 6},$${base + 7})`);
            values.push(row.symbol, row.timestamp, row.open, row.high, row.low, row.close, row.volume);
        });

        await client.query(
            `INSERT INTO ${this.table} (symbol, ts, open, high, low, close, volume)
             VALUES ${placeholders.join(',')}
             ON CONFLICT (symbol, ts) DO UPDATE SET
               open = EXCLUDED.open,
               high = EXCLUDED.high,
               low = EXCLUDED.low,
               close = EXCLUDED.close,
               volume = EXCLUDED.volume,
               ingested_at = NOW()`,
            values
        );
    }

    async countRows(symbol: string): Promise<number> {
        const result = await withStorageRetry(`Postgres count on ${this.table}`, () =>
            this.pool.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${this.table} WHERE symbol = $1`, [symbol]),
        { isTransient: isTransientPgError });

        return result.rows.length > 0 ? result.rows[0].count : 0;
    }

    /**
     * Create the warehouse table and its time index if they do not exist
     */
    async ensureSchema(): Promise<void> {
        await withStorageRetry(`Postgres schema for ${this.table}`, async () => {
            await this.pool.query(`
                CREATE TABLE IF NOT EXISTS ${this.table} (
                    symbol TEXT NOT NULL,
                    ts TIMESTAMPTZ NOT NULL,
                    open DOUBLE PRECISION NOT NULL,
                    high DOUBLE PRECISION NOT NULL,
                    low DOUBLE PRECISION NOT NULL,
                    close DOUBLE PRECISION NOT NULL,
                    volume DOUBLE PRECISION NOT NULL,
                    ingested_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
                    PRIMARY KEY (symbol, ts)
                )`);
            await this.pool.query(`CREATE INDEX IF NOT EXISTS idx_${this.table}_ts ON ${this.table} (ts)`);
        }, { isTransient: isTransientPgError });
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CycleCancelledError('Warehouse write cancelled before commit');
    }
}

async function rollback(client: PoolClient): Promise<void> {
    try {
        await client.query('ROLLBACK');
    } catch (error) {
        console.error('Postgres ROLLBACK failed:', getErrorMessage(error));
    }
}
