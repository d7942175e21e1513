/**
 * Raw store contract and key layout
 *
 * Keys: <prefix>/<symbol>/<startISO>_<endISO>/<fetchedAtMs, 13 digits>-<attemptId>.json
 * The fetch-time component makes lexicographic key order equal to insertion order.
 */

import { createHash } from 'crypto';
import { FetchWindow, RawRecord, RecordRef } from '../types';
import { toIso } from '../utils/time';

export interface RawStore {
    /**
     * Persist a new attempt. Never overwrites: a colliding address gets a fresh attempt id.
     */
    put(record: RawRecord): Promise<RecordRef>;

    /**
     * @throws RawRecordNotFoundError when nothing is stored under the reference
     */
    get(ref: RecordRef): Promise<RawRecord>;

    /**
     * All attempts for a symbol and window, oldest first
     */
    list(symbol: string, window: FetchWindow): Promise<RecordRef[]>;
}

export function windowPrefix(prefix: string, symbol: string, window: FetchWindow): string {
    return `${prefix}/${encodeURIComponent(symbol)}/${toIso(window.start)}_${toIso(window.end)}/`;
}

export function recordKey(prefix: string, symbol: string, window: FetchWindow, fetchedAt: string, attemptId: string): string {
    const fetchedMs = String(Date.parse(fetchedAt)).padStart(13, '0');
    return `${windowPrefix(prefix, symbol, window)}${fetchedMs}-${attemptId}.json`;
}

/**
 * Recover the attempt id from a key produced by recordKey
 */
export function attemptIdFromKey(key: string): string | null {
    const match = /\/\d{13}-([^/]+)\.json$/.exec(key);
    return match ? match[1] : null;
}

export function sha256(body: string): string {
    return createHash('sha256').update(body, 'utf8').digest('hex');
}
