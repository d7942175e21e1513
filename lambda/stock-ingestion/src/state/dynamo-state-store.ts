/**
 * DynamoDB state store
 *
 * Watermark table (pk: symbol) holds the watermark, its version and the
 * symbol's lease. Run record table (pk: symbol, sk: <windowStart>#<startedAt>#<runId>)
 * holds one item per attempt.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
    DynamoDBDocumentClient,
    GetCommand,
    PutCommand,
    QueryCommand,
    UpdateCommand
} from '@aws-sdk/lib-dynamodb';
import { WatermarkConflictError } from '../errors';
import { FetchWindow, RunRecord, RunStatus, WatermarkRecord } from '../types';
import { isConditionalCheckFailed, isTransientAwsError } from '../utils/aws-errors';
import { withStorageRetry } from '../utils/retry';
import { toIso } from '../utils/time';
import { runRecordSortKey, StateStore } from './state-store';

export interface DynamoStateStoreOptions {
    watermarkTable: string;
    runRecordTable: string;
    region?: string;
    client?: DynamoDBClient;
}

type Item = Record<string, unknown>;

const RUN_STATUSES: readonly RunStatus[] = ['running', 'success', 'partial', 'failed', 'cancelled'];

function num(item: Item, field: string): number {
    const value = item[field];
    if (typeof value !== 'number') {
        throw new Error(`State item field ${field} is not a number`);
    }
    return value;
}

function str(item: Item, field: string): string {
    const value = item[field];
    if (typeof value !== 'string') {
        throw new Error(`State item field ${field} is not a string`);
    }
    return value;
}

function optionalStr(item: Item, field: string): string | null {
    const value = item[field];
    return typeof value === 'string' ? value : null;
}

function toWindow(value: unknown): FetchWindow | null {
    if (typeof value === 'object' && value !== null && 'start' in value && 'end' in value
        && typeof value.start === 'number' && typeof value.end === 'number') {
        return { start: value.start, end: value.end };
    }
    return null;
}

function toStatus(value: unknown): RunStatus {
    const status = RUN_STATUSES.find(candidate => candidate === value);
    if (!status) {
        throw new Error(`Unknown run status: ${String(value)}`);
    }
    return status;
}

export function itemToRunRecord(item: Item): RunRecord {
    return {
        runId: str(item, 'runId'),
        symbol: str(item, 'symbol'),
        window: { start: num(item, 'windowStart'), end: num(item, 'windowEnd') },
        attempt: num(item, 'attempt'),
        status: toStatus(item.status),
        startedAt: str(item, 'startedAt'),
        finishedAt: optionalStr(item, 'finishedAt'),
        errorKind: optionalStr(item, 'errorKind'),
        errorMessage: optionalStr(item, 'errorMessage'),
        retryable: item.retryable === true,
        rawKey: optionalStr(item, 'rawKey'),
        rowsWritten: typeof item.rowsWritten === 'number' ? item.rowsWritten : 0,
        rowsSkipped: typeof item.rowsSkipped === 'number' ? item.rowsSkipped : 0,
        rejectCount: typeof item.rejectCount === 'number' ? item.rejectCount : 0,
        skipped: item.skipped === true
    };
}

export class DynamoStateStore implements StateStore {
    private readonly docClient: DynamoDBDocumentClient;
    private readonly watermarkTable: string;
    private readonly runRecordTable: string;

    constructor(options: DynamoStateStoreOptions) {
        const client = options.client ?? new DynamoDBClient({ region: options.region || 'us-west-2' });
        this.docClient = DynamoDBDocumentClient.from(client, {
            marshallOptions: { removeUndefinedValues: true }
        });
        this.watermarkTable = options.watermarkTable;
        this.runRecordTable = options.runRecordTable;
    }

    async getWatermark(symbol: string): Promise<WatermarkRecord | null> {
        const result = await withStorageRetry(`Watermark read for ${symbol}`, () => this.docClient.send(new GetCommand({
            TableName: this.watermarkTable,
            Key: { symbol },
            ConsistentRead: true
        })), { isTransient: isTransientAwsError });

        const item: Item | undefined = result.Item;
        // The item can exist with only a lease on it
        if (!item || typeof item.version !== 'number') {
            return null;
        }

        return {
            symbol,
            position: num(item, 'position'),
            version: item.version,
            blockedWindow: toWindow(item.blockedWindow),
            updatedAt: str(item, 'updatedAt')
        };
    }

    async saveWatermark(next: Omit<WatermarkRecord, 'version'>, expectedVersion: number): Promise<WatermarkRecord> {
        const version = expectedVersion + 1;

        try {
            await withStorageRetry(`Watermark write for ${next.symbol}`, () => this.docClient.send(new UpdateCommand({
                TableName: this.watermarkTable,
                Key: { symbol: next.symbol },
                UpdateExpression: 'SET #position = :position, #positionIso = :positionIso, #version = :version, #blocked = :blocked, #updatedAt = :updatedAt',
                ConditionExpression: expectedVersion === 0 ? 'attribute_not_exists(#version)' : '#version = :expected',
                ExpressionAttributeNames: {
                    '#position': 'position',
                    '#positionIso': 'positionIso',
                    '#version': 'version',
                    '#blocked': 'blockedWindow',
                    '#updatedAt': 'updatedAt'
                },
                ExpressionAttributeValues: {
                    ':position': next.position,
                    ':positionIso': toIso(next.position),
                    ':version': version,
                    ':blocked': next.blockedWindow,
                    ':updatedAt': next.updatedAt,
                    ...(expectedVersion === 0 ? {} : { ':expected': expectedVersion })
                }
            })), { isTransient: isTransientAwsError });
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                throw new WatermarkConflictError(`Watermark for ${next.symbol} changed concurrently (expected version ${expectedVersion})`);
            }
            throw error;
        }

        return { ...next, version };
    }

    async putRunRecord(record: RunRecord): Promise<void> {
        await withStorageRetry(`Run record write for ${record.symbol}`, () => this.docClient.send(new PutCommand({
            TableName: this.runRecordTable,
            Item: {
                symbol: record.symbol,
                sk: runRecordSortKey(record),
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
            }
        })), { isTransient: isTransientAwsError });
    }

    async listRunRecords(symbol: string, window: FetchWindow): Promise<RunRecord[]> {
        const records: RunRecord[] = [];
        let exclusiveStartKey: Item | undefined;

        do {
            const page = await withStorageRetry(`Run record query for ${symbol}`, () => this.docClient.send(new QueryCommand({
                TableName: this.runRecordTable,
                KeyConditionExpression: '#symbol = :symbol AND begins_with(sk, :prefix)',
                ExpressionAttributeNames: { '#symbol': 'symbol' },
                ExpressionAttributeValues: {
                    ':symbol': symbol,
                    ':prefix': `${toIso(window.start)}#`
                },
                ExclusiveStartKey: exclusiveStartKey
            })), { isTransient: isTransientAwsError });

            for (const item of page.Items ?? []) {
                const record = itemToRunRecord(item);
                if (record.window.end === window.end) {
                    records.push(record);
                }
            }
            exclusiveStartKey = page.LastEvaluatedKey;
        } while (exclusiveStartKey);

        return records;
    }

    async latestRunRecord(symbol: string): Promise<RunRecord | null> {
        const result = await withStorageRetry(`Latest run record for ${symbol}`, () => this.docClient.send(new QueryCommand({
            TableName: this.runRecordTable,
            KeyConditionExpression: '#symbol = :symbol',
            ExpressionAttributeNames: { '#symbol': 'symbol' },
            ExpressionAttributeValues: { ':symbol': symbol },
            ScanIndexForward: false,
            Limit: 1
        })), { isTransient: isTransientAwsError });

        const items = result.Items ?? [];
        return items.length > 0 ? itemToRunRecord(items[0]) : null;
    }

    async acquireLease(symbol: string, owner: string, ttlMs: number, now: number): Promise<boolean> {
        try {
            await withStorageRetry(`Lease for ${symbol}`, () => this.docClient.send(new UpdateCommand({
                TableName: this.watermarkTable,
                Key: { symbol },
                UpdateExpression: 'SET leaseOwner = :owner, leaseExpiresAt = :expiresAt',
                ConditionExpression: 'attribute_not_exists(leaseOwner) OR leaseOwner = :owner OR leaseExpiresAt < :now',
                ExpressionAttributeValues: {
                    ':owner': owner,
                    ':expiresAt': now + ttlMs,
                    ':now': now
                }
            })), { isTransient: isTransientAwsError });
            return true;
        } catch (error) {
            if (isConditionalCheckFailed(error)) {
                return false;
            }
            throw error;
        }
    }

    async releaseLease(symbol: string, owner: string): Promise<void> {
        try {
            await withStorageRetry(`Lease release for ${symbol}`, () => this.docClient.send(new UpdateCommand({
                TableName: this.watermarkTable,
                Key: { symbol },
                UpdateExpression: 'REMOVE leaseOwner, leaseExpiresAt',
                ConditionExpression: 'leaseOwner = :owner',
                ExpressionAttributeValues: { ':owner': owner }
            })), { isTransient: isTransientAwsError });
        } catch (error) {
            if (!isConditionalCheckFailed(error)) {
                throw error;
            }
            console.warn(`Lease for ${symbol} was no longer held by ${owner} at release`);
        }
    }
}
