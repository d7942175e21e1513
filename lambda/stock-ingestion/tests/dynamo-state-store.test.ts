/**
 * Unit tests for the DynamoDB state store
 *
 * Tests cover:
 * - Watermark reads, versioned conditional writes and conflicts
 * - Run record items, sort keys and window queries
 * - Lease acquisition and release
 */

import { WatermarkConflictError } from '../src/errors';
import { DynamoStateStore, itemToRunRecord } from '../src/state/dynamo-state-store';
import { RunRecord } from '../src/types';

const mockSend = jest.fn();

jest.mock('@aws-sdk/lib-dynamodb', () => ({
    DynamoDBDocumentClient: { from: jest.fn(() => ({ send: mockSend })) },
    GetCommand: jest.fn((input: unknown) => ({ command: 'Get', input })),
    PutCommand: jest.fn((input: unknown) => ({ command: 'Put', input })),
    QueryCommand: jest.fn((input: unknown) => ({ command: 'Query', input })),
    UpdateCommand: jest.fn((input: unknown) => ({ command: 'Update', input }))
}));

const WINDOW = { start: Date.UTC(2024, 0, 5), end: Date.UTC(2024, 0, 6) };

function conditionalCheckFailed(): Error {
    return Object.assign(new Error('The conditional request failed'), {
        name: 'ConditionalCheckFailedException',
        $metadata: { httpStatusCode: 400 }
    });
}

function runRecord(overrides: Partial<RunRecord> = {}): RunRecord {
    return {
        runId: 'run-1',
        symbol: 'AAPL',
        window: WINDOW,
        attempt: 1,
        status: 'success',
        startedAt: '2024-01-06T01:00:00.000Z',
        finishedAt: '2024-01-06T01:00:02.000Z',
        errorKind: null,
        errorMessage: null,
        retryable: false,
        rawKey: 'raw/AAPL/2024-01-05T00:00:00.000Z_2024-01-06T00:00:00.000Z/1704502800000-run-1.json',
        rowsWritten: 1,
        rowsSkipped: 0,
        rejectCount: 0,
        skipped: false,
        ...overrides
    };
}

function runRecordItem(record: RunRecord): Record<string, unknown> {
    return {
        symbol: record.symbol,
        sk: `2024-01-05T00:00:00.000Z#${record.startedAt}#${record.runId}`,
        runId: record.runId,
        windowStart: record.window.start,
        windowEnd: record.window.end,
        attempt: record.attempt,
        status: record.status,
        startedAt: record.startedAt,
        finishedAt: record.finishedAt,
        errorKind: record.errorKind,
        errorMessage: record.errorMessage,
        retryable: record.retryable,
        rawKey: record.rawKey,
        rowsWritten: record.rowsWritten,
        rowsSkipped: record.rowsSkipped,
        rejectCount: record.rejectCount,
        skipped: record.skipped
    };
}

describe('DynamoStateStore', () => {
    let store: DynamoStateStore;

    beforeEach(() => {
        mockSend.mockReset();
        store = new DynamoStateStore({ watermarkTable: 'watermarks', runRecordTable: 'run-records' });
    });

    describe('getWatermark', () => {
        it('should read the watermark with a consistent read', async () => {
            mockSend.mockResolvedValueOnce({
                Item: {
                    symbol: 'AAPL',
                    position: WINDOW.end,
                    positionIso: '2024-01-06T00:00:00.000Z',
                    version: 4,
                    blockedWindow: null,
                    updatedAt: '2024-01-06T01:00:02.000Z'
                }
            });

            const watermark = await store.getWatermark('AAPL');

            expect(watermark).toEqual({
                symbol: 'AAPL',
                position: WINDOW.end,
                version: 4,
                blockedWindow: null,
                updatedAt: '2024-01-06T01:00:02.000Z'
            });
            expect(mockSend.mock.calls[0][0]).toEqual({
                command: 'Get',
                input: { TableName: 'watermarks', Key: { symbol: 'AAPL' }, ConsistentRead: true }
            });
        });

        it('should return the blocked window when one is stored', async () => {
            mockSend.mockResolvedValueOnce({
                Item: { symbol: 'AAPL', position: WINDOW.start, version: 2, blockedWindow: WINDOW, updatedAt: '2024-01-06T01:00:02.000Z' }
            });

            expect((await store.getWatermark('AAPL'))?.blockedWindow).toEqual(WINDOW);
        });

        it('should return null when no watermark has been saved', async () => {
            mockSend.mockResolvedValueOnce({});
            expect(await store.getWatermark('AAPL')).toBeNull();

            // An item holding only a lease
            mockSend.mockResolvedValueOnce({ Item: { symbol: 'AAPL', leaseOwner: 'owner-1', leaseExpiresAt: 1 } });
            expect(await store.getWatermark('AAPL')).toBeNull();
        });
    });

    describe('saveWatermark', () => {
        const next = { symbol: 'AAPL', position: WINDOW.end, blockedWindow: null, updatedAt: '2024-01-06T01:00:02.000Z' };

        it('should write the first watermark only if none exists', async () => {
            mockSend.mockResolvedValueOnce({});

            const saved = await store.saveWatermark(next, 0);

            expect(saved).toEqual({ ...next, version: 1 });
            const { input } = mockSend.mock.calls[0][0];
            expect(input.ConditionExpression).toBe('attribute_not_exists(#version)');
            expect(input.ExpressionAttributeValues).toEqual({
                ':position': WINDOW.end,
                ':positionIso': '2024-01-06T00:00:00.000Z',
                ':version': 1,
                ':blocked': null,
                ':updatedAt': '2024-01-06T01:00:02.000Z'
            });
        });

        it('should require the expected version on later writes', async () => {
            mockSend.mockResolvedValueOnce({});

            const saved = await store.saveWatermark(next, 3);

            expect(saved.version).toBe(4);
            const { input } = mockSend.mock.calls[0][0];
            expect(input.ConditionExpression).toBe('#version = :expected');
            expect(input.ExpressionAttributeValues[':expected']).toBe(3);
            expect(input.ExpressionAttributeValues[':version']).toBe(4);
        });

        it('should raise WatermarkConflictError when the version moved', async () => {
            mockSend.mockRejectedValueOnce(conditionalCheckFailed());

            await expect(store.saveWatermark(next, 3)).rejects.toBeInstanceOf(WatermarkConflictError);
        });
    });

    describe('run records', () => {
        it('should store one item per attempt under a sortable key', async () => {
            mockSend.mockResolvedValueOnce({});
            const record = runRecord();

            await store.putRunRecord(record);

            expect(mockSend.mock.calls[0][0]).toEqual({
                command: 'Put',
                input: { TableName: 'run-records', Item: runRecordItem(record) }
            });
        });

        it('should query a window by sort key prefix and page through results', async () => {
            const first = runRecord({ runId: 'run-1', attempt: 1, status: 'failed', errorKind: 'transient-fetch', retryable: true });
            const second = runRecord({ runId: 'run-2', attempt: 2, startedAt: '2024-01-06T01:00:05.000Z' });
            const otherWindow = runRecord({ runId: 'run-3', window: { start: WINDOW.start, end: WINDOW.start + 3_600_000 } });
            mockSend
                .mockResolvedValueOnce({ Items: [runRecordItem(first)], LastEvaluatedKey: { symbol: 'AAPL', sk: 'page-1' } })
                .mockResolvedValueOnce({ Items: [runRecordItem(second), runRecordItem(otherWindow)] });

            const records = await store.listRunRecords('AAPL', WINDOW);

            expect(records).toEqual([first, second]);
            expect(mockSend.mock.calls[0][0].input).toEqual({
                TableName: 'run-records',
                KeyConditionExpression: '#symbol = :symbol AND begins_with(sk, :prefix)',
                ExpressionAttributeNames: { '#symbol': 'symbol' },
                ExpressionAttributeValues: { ':symbol': 'AAPL', ':prefix': '2024-01-05T00:00:00.000Z#' },
                ExclusiveStartKey: undefined
            });
            expect(mockSend.mock.calls[1][0].input.ExclusiveStartKey).toEqual({ symbol: 'AAPL', sk: 'page-1' });
        });

        it('should read the latest run record newest first', async () => {
            const record = runRecord();
            mockSend.mockResolvedValueOnce({ Items: [runRecordItem(record)] });

            expect(await store.latestRunRecord('AAPL')).toEqual(record);
            expect(mockSend.mock.calls[0][0].input.ScanIndexForward).toBe(false);
            expect(mockSend.mock.calls[0][0].input.Limit).toBe(1);
        });

        it('should return null when a symbol has no runs', async () => {
            mockSend.mockResolvedValueOnce({ Items: [] });

            expect(await store.latestRunRecord('AAPL')).toBeNull();
        });

        it('should refuse items with an unknown status', () => {
            expect(() => itemToRunRecord({ ...runRecordItem(runRecord()), status: 'exploded' })).toThrow('Unknown run status: exploded');
        });
    });

    describe('leases', () => {
        it('should take the lease when it is free, held by the same owner or expired', async () => {
            mockSend.mockResolvedValueOnce({});

            expect(await store.acquireLease('AAPL', 'owner-1', 60_000, 1_000)).toBe(true);
            const { input } = mockSend.mock.calls[0][0];
            expect(input.ConditionExpression).toBe('attribute_not_exists(leaseOwner) OR leaseOwner = :owner OR leaseExpiresAt < :now');
            expect(input.ExpressionAttributeValues).toEqual({ ':owner': 'owner-1', ':expiresAt': 61_000, ':now': 1_000 });
        });

        it('should report a lease held by someone else', async () => {
            mockSend.mockRejectedValueOnce(conditionalCheckFailed());

            expect(await store.acquireLease('AAPL', 'owner-2', 60_000, 1_000)).toBe(false);
        });

        it('should release only a lease it owns', async () => {
            mockSend.mockResolvedValueOnce({}).mockRejectedValueOnce(conditionalCheckFailed());

            await store.releaseLease('AAPL', 'owner-1');
            await expect(store.releaseLease('AAPL', 'owner-1')).resolves.toBeUndefined();

            expect(mockSend.mock.calls[0][0].input.UpdateExpression).toBe('REMOVE leaseOwner, leaseExpiresAt');
            expect(mockSend.mock.calls[0][0].input.ConditionExpression).toBe('leaseOwner = :owner');
        });

        it('should surface other lease failures', async () => {
            mockSend.mockRejectedValueOnce(Object.assign(new Error('User is not authorized'), { name: 'AccessDeniedException' }));

            await expect(store.acquireLease('AAPL', 'owner-1', 60_000, 1_000)).rejects.toThrow('User is not authorized');
        });
    });
});
