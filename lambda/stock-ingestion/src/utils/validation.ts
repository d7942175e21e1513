/**
 * Data validation module for OHLCV entries
 */

import { FetchWindow, NormalizedRow, RawEntry } from '../types';
import { containsInstant, formatWindow, toIso } from './time';

export type EntryValidation =
    | { ok: true; row: NormalizedRow }
    | { ok: false; reason: string };

/**
 * Coerce a provider value into a number.
 * Providers send numbers (Yahoo) or numeric strings (Alpha Vantage, CSV).
 * @returns The number, or a message describing why it is unusable
 */
function toFiniteNumber(field: string, value: unknown): number | string {
    if (value === null) {
        return `${field} is null`;
    }
    if (value === undefined) {
        return `${field} is undefined`;
    }

    let numeric: number;
    if (typeof value === 'number') {
        numeric = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
        numeric = Number(value.trim());
    } else {
        return `${field} is not numeric: ${JSON.stringify(value)}`;
    }

    if (isNaN(numeric)) {
        return `${field} is NaN`;
    }
    if (!isFinite(numeric)) {
        return `${field} is infinite`;
    }

    return numeric;
}

/**
 * Coerce a provider timestamp into epoch milliseconds.
 * Numbers are taken as epoch milliseconds; strings are parsed as ISO 8601.
 */
function toTimestamp(value: unknown): number | string {
    if (typeof value === 'number') {
        return isFinite(value) ? value : 'timestamp is not finite';
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const ms = Date.parse(value.trim());
        return isNaN(ms) ? `timestamp ${value} is not a valid date` : ms;
    }
    return `timestamp is missing`;
}

/**
 * Validate one raw entry against the window and the OHLCV rules:
 * timestamp inside [start, end), all fields finite,
 * low <= open <= high, low <= close <= high, volume >= 0
 */
export function validateEntry(symbol: string, entry: RawEntry, window: FetchWindow): EntryValidation {
    const timestamp = toTimestamp(entry.timestamp);
    if (typeof timestamp === 'string') {
        return { ok: false, reason: timestamp };
    }
    if (!containsInstant(window, timestamp)) {
        return { ok: false, reason: `timestamp ${toIso(timestamp)} is outside window ${formatWindow(window)}` };
    }

    const open = toFiniteNumber('open', entry.open);
    if (typeof open === 'string') return { ok: false, reason: open };
    const high = toFiniteNumber('high', entry.high);
    if (typeof high === 'string') return { ok: false, reason: high };
    const low = toFiniteNumber('low', entry.low);
    if (typeof low === 'string') return { ok: false, reason: low };
    const close = toFiniteNumber('close', entry.close);
    if (typeof close === 'string') return { ok: false, reason: close };
    const volume = toFiniteNumber('volume', entry.volume);
    if (typeof volume === 'string') return { ok: false, reason: volume };

    if (high < low) {
        return { ok: false, reason: `high (${high}) < low (${low})` };
    }
    if (open < low || open > high) {
        return { ok: false, reason: `open (${open}) outside [low, high] range [${low}, ${high}]` };
    }
    if (close < low || close > high) {
        return { ok: false, reason: `close (${close}) outside [low, high] range [${low}, ${high}]` };
    }
    if (volume < 0) {
        return { ok: false, reason: `volume (${volume}) is negative` };
    }

    return {
        ok: true,
        row: { symbol, timestamp: new Date(timestamp), open, high, low, close, volume }
    };
}

/**
 * Last line of defence before a row reaches the warehouse
 */
export function isWritableRow(row: NormalizedRow): boolean {
    const values = [row.open, row.high, row.low, row.close, row.volume, row.timestamp.getTime()];
    return values.every(value => typeof value === 'number' && isFinite(value));
}
