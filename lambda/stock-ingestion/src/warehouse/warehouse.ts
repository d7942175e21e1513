/**
 * Warehouse writer contract
 */

import { CycleOptions, NormalizedRow, WriteResult } from '../types';
import { isWritableRow } from '../utils/validation';

export interface Warehouse {
    /**
     * Upsert rows keyed by (symbol, timestamp) in a single transaction.
     * Either every row is committed or none is.
     */
    write(rows: NormalizedRow[], options?: CycleOptions): Promise<WriteResult>;

    countRows(symbol: string): Promise<number>;

    ensureSchema?(): Promise<void>;

    close?(): Promise<void>;
}

export interface PreparedBatch {
    rows: NormalizedRow[];
    skipped: number;
}

/**
 * Order rows by timestamp and collapse duplicate keys, last write wins.
 * Rows with non-finite values are dropped. Every dropped row counts as skipped.
 */
export function prepareBatch(rows: NormalizedRow[]): PreparedBatch {
    const byKey = new Map<string, NormalizedRow>();
    let skipped = 0;

    for (const row of rows) {
        if (!isWritableRow(row)) {
            skipped++;
            continue;
        }

        const key = `${row.symbol}|${row.timestamp.getTime()}`;
        if (byKey.has(key)) {
            skipped++;
        }
        byKey.set(key, row);
    }

    const prepared = Array.from(byKey.values()).sort((a, b) =>
        a.timestamp.getTime() - b.timestamp.getTime() || a.symbol.localeCompare(b.symbol)
    );

    return { rows: prepared, skipped };
}
