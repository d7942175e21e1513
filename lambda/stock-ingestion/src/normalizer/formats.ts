/**
 * Payload parsers, one per versioned raw format
 *
 * A parser turns a whole payload into raw entries. It only fails (with
 * StructuralParseError) when the payload is not the expected container;
 * per-entry problems are left for validation.
 */

import { parse } from 'csv-parse/sync';
import { ALPHA_VANTAGE_DAILY_FORMAT, CSV_OHLCV_FORMAT } from '../clients/alpha-vantage-client';
import { YAHOO_CHART_FORMAT } from '../clients/yahoo-client';
import { getErrorMessage, StructuralParseError } from '../errors';
import { RawEntry } from '../types';

export { CSV_OHLCV_FORMAT };

export type PayloadParser = (body: string) => RawEntry[];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(format: string, body: string): unknown {
    try {
        return JSON.parse(body);
    } catch (error) {
        throw new StructuralParseError(`${format} payload is not valid JSON: ${getErrorMessage(error)}`, { cause: error });
    }
}

function at(values: unknown, index: number): unknown {
    return Array.isArray(values) ? values[index] : undefined;
}

/**
 * Yahoo v8 chart response: parallel arrays under chart.result[0].
 * Timestamps are epoch seconds.
 */
export function parseYahooChart(body: string): RawEntry[] {
    const parsed = parseJson(YAHOO_CHART_FORMAT, body);
    const chart = isRecord(parsed) ? parsed.chart : undefined;
    if (!isRecord(chart)) {
        throw new StructuralParseError('Yahoo payload has no chart object');
    }

    if (chart.error !== null && chart.error !== undefined) {
        const description = isRecord(chart.error) ? chart.error.description : chart.error;
        throw new StructuralParseError(`Yahoo payload carries an error: ${String(description)}`);
    }

    const result = Array.isArray(chart.result) ? chart.result[0] : undefined;
    if (!isRecord(result)) {
        throw new StructuralParseError('Yahoo payload has no chart result');
    }

    // No bars in the requested range: Yahoo omits the timestamp array entirely
    if (result.timestamp === undefined) {
        return [];
    }
    if (!Array.isArray(result.timestamp)) {
        throw new StructuralParseError('Yahoo payload timestamp is not an array');
    }

    const indicators = result.indicators;
    const quote = isRecord(indicators) && Array.isArray(indicators.quote) ? indicators.quote[0] : undefined;
    if (!isRecord(quote)) {
        throw new StructuralParseError('Yahoo payload has no quote indicators');
    }

    return result.timestamp.map((seconds: unknown, index: number): RawEntry => ({
        index,
        timestamp: typeof seconds === 'number' ? seconds * 1000 : seconds,
        open: at(quote.open, index),
        high: at(quote.high, index),
        low: at(quote.low, index),
        close: at(quote.close, index),
        volume: at(quote.volume, index)
    }));
}

/**
 * Alpha Vantage TIME_SERIES_DAILY: an object keyed by 'YYYY-MM-DD'
 * with numeric strings under '1. open' .. '5. volume'. Dates are taken as UTC midnight.
 */
export function parseAlphaVantageDaily(body: string): RawEntry[] {
    const parsed = parseJson(ALPHA_VANTAGE_DAILY_FORMAT, body);
    const series = isRecord(parsed) ? parsed['Time Series (Daily)'] : undefined;
    if (!isRecord(series)) {
        throw new StructuralParseError('Alpha Vantage payload has no "Time Series (Daily)" object');
    }

    return Object.keys(series)
        .sort()
        .map((date, index): RawEntry => {
            const values = series[date];
            const bar = isRecord(values) ? values : {};
            return {
                index,
                timestamp: date,
                open: bar['1. open'],
                high: bar['2. high'],
                low: bar['3. low'],
                close: bar['4. close'],
                volume: bar['5. volume']
            };
        });
}

const CSV_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'];

/**
 * CSV with a header row naming timestamp, open, high, low, close and volume
 */
export function parseOhlcvCsv(body: string): RawEntry[] {
    let header: string[] = [];
    let records: unknown;
    try {
        records = parse(body, {
            bom: true,
            columns: (names: string[]) => {
                header = names.map(column => column.trim().toLowerCase());
                return header;
            },
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true
        });
    } catch (error) {
        throw new StructuralParseError(`${CSV_OHLCV_FORMAT} payload could not be parsed: ${getErrorMessage(error)}`, { cause: error });
    }

    if (!Array.isArray(records)) {
        throw new StructuralParseError(`${CSV_OHLCV_FORMAT} payload did not produce rows`);
    }

    const missing = CSV_COLUMNS.filter(column => !header.includes(column));
    if (missing.length > 0) {
        throw new StructuralParseError(`${CSV_OHLCV_FORMAT} payload is missing columns: ${missing.join(', ')}`);
    }

    return records.map((record: unknown, index: number): RawEntry => {
        const row = isRecord(record) ? record : {};
        return {
            index,
            timestamp: row.timestamp,
            open: row.open,
            high: row.high,
            low: row.low,
            close: row.close,
            volume: row.volume
        };
    });
}

const PARSERS: Record<string, PayloadParser> = {
    [YAHOO_CHART_FORMAT]: parseYahooChart,
    [ALPHA_VANTAGE_DAILY_FORMAT]: parseAlphaVantageDaily,
    [CSV_OHLCV_FORMAT]: parseOhlcvCsv
};

export function getParser(format: string): PayloadParser {
    const parser = Object.prototype.hasOwnProperty.call(PARSERS, format) ? PARSERS[format] : undefined;
    if (!parser) {
        throw new StructuralParseError(`Unknown raw format: '${format}'`);
    }
    return parser;
}

export function supportedFormats(): string[] {
    return Object.keys(PARSERS);
}
