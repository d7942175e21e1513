/**
 * Unit tests for the warehouse writer
 *
 * Tests cover:
 * - Batch preparation: ordering, duplicate keys, unwritable rows
 * - One transaction per write with chunked upserts
 * - Rollback on failure and on cancellation before commit
 * - Retries of transient connection failures
 * - Row counts and schema creation
 */

import { ConfigurationError, CycleCancelledError } from '../src/errors';
import { isTransientPgError, PostgresWarehouse } from '../src/warehouse/postgres-warehouse';
import { prepareBatch } from '../src/warehouse/warehouse';
import { NormalizedRow } from '../src/types';

const mockClientQuery = jest.fn();
const mockRelease = jest.fn();
const mockConnect = jest.fn();
const mockPoolQuery = jest.fn();
const mockEnd = jest.fn();

jest.mock('pg', () => ({
    Pool: jest.fn(() => ({
        connect: mockConnect,
        query: mockPoolQuery,
        end: mockEnd,
        on: jest.fn()
    }))
}));

const OPTIONS = {
    host: 'localhost',
    port: 5432,
    database: 'postgres',
    user: 'postgres',
    password: 'test-secret',
    table: 'stock_bars'
};

function row(hour: number, close: number = 100, symbol: string = 'AAPL'): NormalizedRow {
    return {
        symbol,
        timestamp: new Date(Date.UTC(2024, 0, 5, hour)),
        open: close - 1,
        high: close + 2,
        low: close - 2,
        close,
        volume: 1000
    };
}

function statements(): string[] {
    return mockClientQuery.mock.calls.map(call => {
        const sql: string = call[0];
        return sql.trim().split(/\s+/).slice(0, 2).join(' ');
    });
}

describe('prepareBatch', () => {
    it('should order rows by timestamp and let the last duplicate win', () => {
        const batch = prepareBatch([row(16, 101), row(14, 100), row(16, 105)]);

        expect(batch.skipped).toBe(1);
        expect(batch.rows.map(r => [r.timestamp.getUTCHours(), r.close])).toEqual([[14, 100], [16, 105]]);
    });

    it('should drop rows with values that cannot be written', () => {
        const batch = prepareBatch([row(14), { ...row(15), volume: NaN }, { ...row(16), timestamp: new Date('invalid') }]);

        expect(batch.skipped).toBe(2);
        expect(batch.rows).toHaveLength(1);
    });

    it('should order symbols sharing a timestamp by name', () => {
        const batch = prepareBatch([row(14, 100, 'MSFT'), row(14, 100, 'AAPL')]);

        expect(batch.rows.map(r => r.symbol)).toEqual(['AAPL', 'MSFT']);
    });
});

describe('PostgresWarehouse', () => {
    beforeEach(() => {
        for (const mock of [mockClientQuery, mockRelease, mockConnect, mockPoolQuery, mockEnd]) {
            mock.mockReset();
        }
        mockConnect.mockResolvedValue({ query: mockClientQuery, release: mockRelease });
        mockClientQuery.mockResolvedValue({ rows: [] });
    });

    it('should refuse table names that are not plain identifiers', () => {
        expect(() => new PostgresWarehouse({ ...OPTIONS, table: 'bars; DROP TABLE bars' })).toThrow(ConfigurationError);
    });

    describe('write', () => {
        it('should upsert every row in chunks inside one transaction', async () => {
            const warehouse = new PostgresWarehouse({ ...OPTIONS, chunkSize: 2 });

            const result = await warehouse.write([row(16), row(14), row(15), row(14, 110)]);

            expect(result).toEqual({ written: 3, skipped: 1 });
            expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'INSERT INTO', 'COMMIT']);

            const [firstSql, firstValues] = mockClientQuery.mock.calls[1];
            expect(firstSql).toContain('INSERT INTO stock_bars (symbol, ts, open, high, low, close, volume)');
            expect(firstSql).toContain('ON CONFLICT (symbol, ts) DO UPDATE SET');
            expect(firstSql).toContain('($1,$2,$3,$4,$5,$6,$7),($8,$9,$10,$11,$12,$13,$14)');
            expect(firstValues).toEqual([
                'AAPL', new Date(Date.UTC(2024, 0, 5, 14)), 109, 112, 108, 110, 1000,
                'AAPL', new Date(Date.UTC(2024, 0, 5, 15)), 99, 102, 98, 100, 1000
            ]);
            expect(mockClientQuery.mock.calls[2][1]).toEqual(['AAPL', new Date(Date.UTC(2024, 0, 5, 16)), 99, 102, 98, 100, 1000]);
            expect(mockRelease).toHaveBeenCalledTimes(1);
        });

        it('should not open a transaction for an empty batch', async () => {
            const warehouse = new PostgresWarehouse(OPTIONS);

            expect(await warehouse.write([])).toEqual({ written: 0, skipped: 0 });
            expect(mockConnect).not.toHaveBeenCalled();
        });

        it('should roll back and rethrow when an upsert fails', async () => {
            mockClientQuery.mockImplementation(async (sql: string) => {
                if (sql.startsWith('INSERT')) {
                    throw Object.assign(new Error('value out of range'), { code: '22003' });
                }
                return { rows: [] };
            });
            const warehouse = new PostgresWarehouse(OPTIONS);

            await expect(warehouse.write([row(14)])).rejects.toThrow('value out of range');
            expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'ROLLBACK']);
            expect(mockRelease).toHaveBeenCalledTimes(1);
            expect(mockConnect).toHaveBeenCalledTimes(1);
        });

        it('should roll back when cancelled between chunks', async () => {
            const controller = new AbortController();
            mockClientQuery.mockImplementation(async (sql: string) => {
                if (sql.startsWith('INSERT')) {
                    controller.abort();
                }
                return { rows: [] };
            });
            const warehouse = new PostgresWarehouse({ ...OPTIONS, chunkSize: 1 });

            await expect(warehouse.write([row(14), row(15)], { signal: controller.signal })).rejects.toBeInstanceOf(CycleCancelledError);
            expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'ROLLBACK']);
        });

        it('should not connect when already cancelled', async () => {
            const controller = new AbortController();
            controller.abort();
            const warehouse = new PostgresWarehouse(OPTIONS);

            await expect(warehouse.write([row(14)], { signal: controller.signal })).rejects.toThrow('Warehouse write cancelled before commit');
            expect(mockConnect).not.toHaveBeenCalled();
        });

        it('should retry a refused connection', async () => {
            mockConnect
                .mockRejectedValueOnce(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' }))
                .mockResolvedValueOnce({ query: mockClientQuery, release: mockRelease });
            const warehouse = new PostgresWarehouse(OPTIONS);

            expect(await warehouse.write([row(14)])).toEqual({ written: 1, skipped: 0 });
            expect(mockConnect).toHaveBeenCalledTimes(2);
            expect(statements()).toEqual(['BEGIN', 'INSERT INTO', 'COMMIT']);
        });
    });

    it('should count rows for a symbol', async () => {
        mockPoolQuery.mockResolvedValueOnce({ rows: [{ count: 42 }] });
        const warehouse = new PostgresWarehouse(OPTIONS);

        expect(await warehouse.countRows('AAPL')).toBe(42);
        expect(mockPoolQuery).toHaveBeenCalledWith('SELECT COUNT(*)::int AS count FROM stock_bars WHERE symbol = $1', ['AAPL']);
    });

    it('should create the table and its time index', async () => {
        mockPoolQuery.mockResolvedValue({ rows: [] });
        const warehouse = new PostgresWarehouse(OPTIONS);

        await warehouse.ensureSchema();

        expect(mockPoolQuery).toHaveBeenCalledTimes(2);
        expect(mockPoolQuery.mock.calls[0][0]).toContain('CREATE TABLE IF NOT EXISTS stock_bars');
        expect(mockPoolQuery.mock.calls[0][0]).toContain('PRIMARY KEY (symbol, ts)');
        expect(mockPoolQuery.mock.calls[1][0]).toBe('CREATE INDEX IF NOT EXISTS idx_stock_bars_ts ON stock_bars (ts)');
    });

    it('should end the pool on close', async () => {
        mockEnd.mockResolvedValue(undefined);
        const warehouse = new PostgresWarehouse(OPTIONS);

        await warehouse.close();

        expect(mockEnd).toHaveBeenCalledTimes(1);
    });
});

describe('isTransientPgError', () => {
    it.each([
        ['08006', true],
        ['57P01', true],
        ['40001', true],
        ['ECONNRESET', true],
        ['23505', false],
        ['42P01', false]
    ])('should classify code %s as transient: %s', (code, expected) => {
        expect(isTransientPgError(Object.assign(new Error('pg'), { code }))).toBe(expected);
    });

    it('should not treat errors without a code as transient', () => {
        expect(isTransientPgError(new Error('pg'))).toBe(false);
        expect(isTransientPgError('pg')).toBe(false);
    });
});
