/**
 * Persistence for watermarks, run records and per-symbol leases
 */

import { FetchWindow, RunRecord, WatermarkRecord } from '../types';

export interface StateStore {
    getWatermark(symbol: string): Promise<WatermarkRecord | null>;

    /**
     * Write a watermark if the stored version still equals expectedVersion
     * (0 when none has been stored yet).
     * @returns The record as stored, with version = expectedVersion + 1
     * @throws WatermarkConflictError when the stored version differs
     */
    saveWatermark(next: Omit<WatermarkRecord, 'version'>, expectedVersion: number): Promise<WatermarkRecord>;

    /**
     * Insert or close a run record. A record is written at most twice: once
     * as 'running' and once with its final status.
     */
    putRunRecord(record: RunRecord): Promise<void>;

    /**
     * Run records of one window, oldest attempt first
     */
    listRunRecords(symbol: string, window: FetchWindow): Promise<RunRecord[]>;

    latestRunRecord(symbol: string): Promise<RunRecord | null>;

    /**
     * Take or renew the symbol's lease for owner. Returns false if another owner holds an unexpired lease.
     */
    acquireLease(symbol: string, owner: string, ttlMs: number, now: number): Promise<boolean>;

    releaseLease(symbol: string, owner: string): Promise<void>;
}

/**
 * Sort key for run records: window start, then attempt start, then run id
 */
export function runRecordSortKey(record: Pick<RunRecord, 'window' | 'startedAt' | 'runId'>): string {
    return `${new Date(record.window.start).toISOString()}#${record.startedAt}#${record.runId}`;
}
