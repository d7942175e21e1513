/**
 * Window and cadence helpers
 */

import { FetchWindow } from '../types';

const UNIT_MS: Record<string, number> = {
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000,
    w: 604_800_000
};

/**
 * Parse a cadence such as '15m', '1h', '1d' or '1w' into milliseconds
 * @returns Duration in milliseconds, or null if the cadence is not recognised
 */
export function parseCadence(cadence: string): number | null {
    const match = /^(\d+)\s*([mhdw])$/.exec(cadence.trim());
    if (!match) {
        return null;
    }

    const amount = parseInt(match[1], 10);
    if (amount <= 0) {
        return null;
    }

    return amount * UNIT_MS[match[2]];
}

/**
 * Parse an ISO 8601 date or timestamp into epoch milliseconds
 */
export function parseInstant(value: string): number | null {
    const ms = Date.parse(value);
    return isNaN(ms) ? null : ms;
}

export function toIso(ms: number): string {
    return new Date(ms).toISOString();
}

export function formatWindow(window: FetchWindow): string {
    return `[${toIso(window.start)}, ${toIso(window.end)})`;
}

export function containsInstant(window: FetchWindow, ms: number): boolean {
    return ms >= window.start && ms < window.end;
}

/**
 * Next window after a watermark: [watermark, min(watermark + cadence, now))
 * @returns The window, or null when it would be empty
 */
export function nextWindow(
    watermark: number,
    cadenceMs: number,
    now: number,
    closedOnly: boolean = false
): FetchWindow | null {
    const fullEnd = watermark + cadenceMs;
    const end = Math.min(fullEnd, now);

    if (end <= watermark) {
        return null;
    }
    if (closedOnly && end < fullEnd) {
        return null;
    }

    return { start: watermark, end };
}
