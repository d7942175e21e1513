/**
 * Normalizer: raw provider payload -> validated OHLCV rows
 */

import { StructuralParseError } from '../errors';
import { RawStore } from '../raw-store/raw-store';
import { FetchWindow, NormalizeResult, NormalizedRow, RawRecord, ValidationReject } from '../types';
import { formatWindow } from '../utils/time';
import { validateEntry } from '../utils/validation';
import { getParser } from './formats';

const MAX_LOGGED_REJECTS = 5;

/**
 * Parse a raw record and validate every entry against the window.
 * Malformed entries are collected as rejects; only a payload that is not the
 * expected container raises StructuralParseError.
 */
export function normalize(raw: RawRecord, window: FetchWindow): NormalizeResult {
    const parser = getParser(raw.format);
    const entries = parser(raw.body);
    const symbol = raw.ref.symbol;

    const rows: NormalizedRow[] = [];
    const rejects: ValidationReject[] = [];

    for (const entry of entries) {
        const result = validateEntry(symbol, entry, window);
        if (result.ok) {
            rows.push(result.row);
        } else {
            rejects.push({ entry, reason: result.reason });
        }
    }

    if (rejects.length > 0) {
        console.warn(`${symbol} ${formatWindow(window)}: rejected ${rejects.length} of ${entries.length} entries`);
        for (const reject of rejects.slice(0, MAX_LOGGED_REJECTS)) {
            console.warn(`  entry ${reject.entry.index}: ${reject.reason}`);
        }
    }

    return { rows, rejects };
}

/**
 * Normalize the most recent attempt stored for a symbol and window
 */
export async function normalizeLatest(store: RawStore, symbol: string, window: FetchWindow): Promise<NormalizeResult & { raw: RawRecord }> {
    const refs = await store.list(symbol, window);
    if (refs.length === 0) {
        throw new StructuralParseError(`No raw records stored for ${symbol} ${formatWindow(window)}`);
    }

    const raw = await store.get(refs[refs.length - 1]);
    return { ...normalize(raw, window), raw };
}
