/**
 * S3-backed raw store
 *
 * Objects are written with If-None-Match: * so an existing attempt can never be
 * replaced. Works against S3 and S3-compatible stores (MinIO) via `endpoint`.
 */

import {
    GetObjectCommand,
    HeadObjectCommand,
    ListObjectsV2Command,
    PutObjectCommand,
    S3Client
} from '@aws-sdk/client-s3';
import { v4 as uuidv4 } from 'uuid';
import { RawRecordNotFoundError } from '../errors';
import { FetchWindow, ProviderName, RawRecord, RecordRef } from '../types';
import { errorName, httpStatusCode, isTransientAwsError } from '../utils/aws-errors';
import { withStorageRetry } from '../utils/retry';
import { attemptIdFromKey, recordKey, RawStore, windowPrefix } from './raw-store';

const MAX_COLLISION_RETRIES = 5;

export interface S3RawStoreOptions {
    bucket: string;
    prefix?: string;
    region?: string;
    endpoint?: string;
    client?: S3Client;
}

function isCollision(error: unknown): boolean {
    const status = httpStatusCode(error);
    return errorName(error) === 'PreconditionFailed' || status === 412 || status === 409;
}

function isNotFound(error: unknown): boolean {
    return errorName(error) === 'NoSuchKey' || httpStatusCode(error) === 404;
}

function isProvider(value: string | undefined): value is ProviderName {
    return value === 'yahoo' || value === 'alphavantage';
}

export class S3RawStore implements RawStore {
    private readonly client: S3Client;
    private readonly bucket: string;
    private readonly prefix: string;

    constructor(options: S3RawStoreOptions) {
        this.bucket = options.bucket;
        this.prefix = options.prefix ?? 'raw';
        this.client = options.client ?? new S3Client({
            region: options.region || 'us-west-2',
            ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {})
        });
    }

    async put(record: RawRecord): Promise<RecordRef> {
        const { symbol, window } = record.ref;
        let attemptId = record.ref.attemptId;

        for (let collision = 0; collision <= MAX_COLLISION_RETRIES; collision++) {
            const key = recordKey(this.prefix, symbol, window, record.fetchedAt, attemptId);

            try {
                await withStorageRetry(`S3 put ${key}`, () => this.client.send(new PutObjectCommand({
                    Bucket: this.bucket,
                    Key: key,
                    Body: record.body,
                    ContentType: record.contentType,
                    IfNoneMatch: '*',
                    Metadata: {
                        provider: record.provider,
                        format: record.format,
                        'fetched-at': record.fetchedAt,
                        sha256: record.sha256,
                        'attempt-id': attemptId
                    }
                })), { isTransient: isTransientAwsError });

                return { key, symbol, window, attemptId };
            } catch (error) {
                if (!isCollision(error)) {
                    throw error;
                }
                // A retried put whose first try landed collides with itself
                if (await this.isSameAttempt(key, attemptId, record.sha256)) {
                    console.log(`Raw object ${key} was already written by attempt ${attemptId}`);
                    return { key, symbol, window, attemptId };
                }
                const previous = attemptId;
                attemptId = uuidv4();
                console.warn(`Raw object ${key} already exists; attempt ${previous} re-addressed as ${attemptId}`);
            }
        }

        throw new Error(`Could not find a free address for ${symbol} after ${MAX_COLLISION_RETRIES} collisions`);
    }

    private async isSameAttempt(key: string, attemptId: string, sha256: string): Promise<boolean> {
        try {
            const head = await withStorageRetry(`S3 head ${key}`, () => this.client.send(new HeadObjectCommand({
                Bucket: this.bucket,
                Key: key
            })), { isTransient: isTransientAwsError });

            const metadata = head.Metadata ?? {};
            return metadata['attempt-id'] === attemptId && metadata.sha256 === sha256;
        } catch (error) {
            if (isNotFound(error)) {
                return false;
            }
            throw error;
        }
    }

    async get(ref: RecordRef): Promise<RawRecord> {
        try {
            const response = await withStorageRetry(`S3 get ${ref.key}`, () => this.client.send(new GetObjectCommand({
                Bucket: this.bucket,
                Key: ref.key
            })), { isTransient: isTransientAwsError });

            if (!response.Body) {
                throw new RawRecordNotFoundError(ref.key);
            }

            const body = await response.Body.transformToString('utf-8');
            const metadata = response.Metadata ?? {};
            const provider = metadata.provider;
            if (!isProvider(provider)) {
                throw new Error(`Raw object ${ref.key} has unknown provider metadata: ${provider}`);
            }

            return {
                ref,
                provider,
                format: metadata.format ?? '',
                contentType: response.ContentType ?? 'application/octet-stream',
                fetchedAt: metadata['fetched-at'] ?? '',
                body,
                sha256: metadata.sha256 ?? ''
            };
        } catch (error) {
            if (isNotFound(error)) {
                throw new RawRecordNotFoundError(ref.key);
            }
            throw error;
        }
    }

    async list(symbol: string, window: FetchWindow): Promise<RecordRef[]> {
        const prefix = windowPrefix(this.prefix, symbol, window);
        const keys: string[] = [];
        let continuationToken: string | undefined;

        do {
            const page = await withStorageRetry(`S3 list ${prefix}`, () => this.client.send(new ListObjectsV2Command({
                Bucket: this.bucket,
                Prefix: prefix,
                ContinuationToken: continuationToken
            })), { isTransient: isTransientAwsError });

            for (const object of page.Contents ?? []) {
                if (object.Key) {
                    keys.push(object.Key);
                }
            }
            continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
        } while (continuationToken);

        keys.sort();

        const refs: RecordRef[] = [];
        for (const key of keys) {
            const attemptId = attemptIdFromKey(key);
            if (attemptId !== null) {
                refs.push({ key, symbol, window, attemptId });
            }
        }
        return refs;
    }
}
