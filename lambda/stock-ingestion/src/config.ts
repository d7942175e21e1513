/**
 * Configuration loading for the ingestion Lambda
 *
 * Runtime settings come from environment variables set by the CDK construct.
 * Symbols come from SYMBOLS_CONFIG (JSON) or the bundled config/symbols.json.
 */

import defaultSymbols from '../config/symbols.json';
import { ConfigurationError } from './errors';
import { AlphaVantageDatatype, BarInterval, FailurePolicy, IngestionConfig, ProviderName, SymbolConfig } from './types';
import { DEFAULT_RETRY_POLICY } from './utils/retry';
import { parseCadence, parseInstant } from './utils/time';

const BAR_INTERVALS: readonly BarInterval[] = ['1m', '5m', '15m', '30m', '1h', '1d', '1wk'];
const PROVIDERS: readonly ProviderName[] = ['yahoo', 'alphavantage'];

const DEFAULT_START = '2024-01-01';

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
    const value = env[name];
    if (!value) {
        throw new ConfigurationError(`Missing required environment variable: ${name}`);
    }
    return value;
}

function integer(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`Environment variable ${name} must be a non-negative integer, got '${raw}'`);
    }
    return value;
}

function isProvider(value: unknown): value is ProviderName {
    return typeof value === 'string' && (PROVIDERS as readonly string[]).includes(value);
}

function isBarInterval(value: unknown): value is BarInterval {
    return typeof value === 'string' && (BAR_INTERVALS as readonly string[]).includes(value);
}

function parseFailurePolicy(raw: string | undefined): FailurePolicy {
    if (raw === undefined || raw === '' || raw === 'block') {
        return 'block';
    }
    if (raw === 'skip') {
        return 'skip';
    }
    throw new ConfigurationError(`FAILURE_POLICY must be 'block' or 'skip', got '${raw}'`);
}

function parseAlphaVantageDatatype(raw: string | undefined): AlphaVantageDatatype {
    if (raw === undefined || raw === '' || raw === 'json') {
        return 'json';
    }
    if (raw === 'csv') {
        return 'csv';
    }
    throw new ConfigurationError(`ALPHA_VANTAGE_DATATYPE must be 'json' or 'csv', got '${raw}'`);
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env): IngestionConfig {
    const defaultProvider = env.MARKET_DATA_PROVIDER || 'yahoo';
    if (!isProvider(defaultProvider)) {
        throw new ConfigurationError(`MARKET_DATA_PROVIDER must be one of ${PROVIDERS.join(', ')}, got '${defaultProvider}'`);
    }

    const defaultStartRaw = env.DEFAULT_START || DEFAULT_START;
    const defaultStart = parseInstant(defaultStartRaw);
    if (defaultStart === null) {
        throw new ConfigurationError(`DEFAULT_START is not a valid date: '${defaultStartRaw}'`);
    }

    const retry = {
        maxAttempts: integer(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts),
        baseDelayMs: integer(env, 'RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
        maxDelayMs: integer(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs),
        jitterMs: integer(env, 'RETRY_JITTER_MS', DEFAULT_RETRY_POLICY.jitterMs)
    };
    if (retry.maxAttempts < 1) {
        throw new ConfigurationError('RETRY_MAX_ATTEMPTS must be at least 1');
    }

    return {
        environment: env.ENVIRONMENT || 'dev',
        awsRegion: env.AWS_REGION || 'us-west-2',
        rawBucket: required(env, 'RAW_BUCKET'),
        rawPrefix: env.RAW_PREFIX || 'raw',
        watermarkTable: required(env, 'WATERMARK_TABLE'),
        runRecordTable: required(env, 'RUN_RECORD_TABLE'),
        postgres: {
            host: required(env, 'PG_HOST'),
            port: integer(env, 'PG_PORT', 5432),
            database: env.PG_DATABASE || 'postgres',
            user: env.PG_USER || 'postgres',
            passwordSecret: env.PG_PASSWORD_SECRET || null,
            password: env.PG_PASSWORD || null,
            table: env.PG_TABLE || 'stock_bars'
        },
        defaultProvider,
        alphaVantageKeyParameter: env.ALPHA_VANTAGE_API_KEY_PARAMETER || null,
        alphaVantageDatatype: parseAlphaVantageDatatype(env.ALPHA_VANTAGE_DATATYPE),
        fetchTimeoutMs: integer(env, 'FETCH_TIMEOUT_MS', 10000),
        retry,
        failurePolicy: parseFailurePolicy(env.FAILURE_POLICY),
        workerConcurrency: Math.max(1, integer(env, 'WORKER_CONCURRENCY', 4)),
        maxWindowsPerTick: Math.max(1, integer(env, 'MAX_WINDOWS_PER_TICK', 24)),
        closedWindowsOnly: env.CLOSED_WINDOWS_ONLY === 'true',
        defaultStart,
        leaseTtlMs: integer(env, 'LEASE_TTL_MS', 15 * 60 * 1000),
        cancelMarginMs: integer(env, 'CANCEL_MARGIN_MS', 15000),
        alertTopicArn: env.ALERT_TOPIC_ARN || null
    };
}

export interface SymbolDefaults {
    provider: ProviderName;
    startFrom: number;
}

/**
 * Validate the {symbol -> {cadence, enabled, ...}} mapping
 * @returns Symbol configurations in mapping order
 */
export function parseSymbolConfigs(mapping: unknown, defaults: SymbolDefaults): SymbolConfig[] {
    if (typeof mapping !== 'object' || mapping === null || Array.isArray(mapping)) {
        throw new ConfigurationError('Symbol configuration must be an object keyed by symbol');
    }

    const symbols: SymbolConfig[] = [];

    for (const [symbol, raw] of Object.entries(mapping)) {
        if (!/^[A-Za-z0-9.^=\-]{1,20}$/.test(symbol)) {
            throw new ConfigurationError(`Invalid symbol: '${symbol}'`);
        }
        if (typeof raw !== 'object' || raw === null) {
            throw new ConfigurationError(`Configuration for ${symbol} must be an object`);
        }

        const entry: Record<string, unknown> = { ...raw };

        const cadence = entry.cadence;
        const cadenceMs = typeof cadence === 'string' ? parseCadence(cadence) : null;
        if (typeof cadence !== 'string' || cadenceMs === null) {
            throw new ConfigurationError(`Invalid cadence for ${symbol}: ${JSON.stringify(cadence)}`);
        }

        const interval = entry.interval ?? '1d';
        if (!isBarInterval(interval)) {
            throw new ConfigurationError(`Invalid interval for ${symbol}: ${JSON.stringify(interval)}`);
        }

        const provider = entry.provider ?? defaults.provider;
        if (!isProvider(provider)) {
            throw new ConfigurationError(`Invalid provider for ${symbol}: ${JSON.stringify(provider)}`);
        }

        let startFrom = defaults.startFrom;
        if (entry.startFrom !== undefined) {
            const parsed = typeof entry.startFrom === 'string' ? parseInstant(entry.startFrom) : null;
            if (parsed === null) {
                throw new ConfigurationError(`Invalid startFrom for ${symbol}: ${JSON.stringify(entry.startFrom)}`);
            }
            startFrom = parsed;
        }

        symbols.push({
            symbol,
            cadence,
            cadenceMs,
            interval,
            enabled: entry.enabled !== false,
            provider,
            startFrom
        });
    }

    return symbols;
}

/**
 * Load symbol configuration from SYMBOLS_CONFIG or the bundled defaults
 */
export function loadSymbolConfigs(config: IngestionConfig, env: Env = process.env): SymbolConfig[] {
    const defaults: SymbolDefaults = { provider: config.defaultProvider, startFrom: config.defaultStart };
    const inline = env.SYMBOLS_CONFIG;

    if (inline) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(inline);
        } catch (error) {
            throw new ConfigurationError(`SYMBOLS_CONFIG is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
        return parseSymbolConfigs(parsed, defaults);
    }

    return parseSymbolConfigs(defaultSymbols, defaults);
}
