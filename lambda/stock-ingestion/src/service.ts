/**
 * Main service class for stock data ingestion
 *
 * Wires configuration, secrets and the AWS/Postgres adapters into a
 * Coordinator. Secrets are fetched on first use, so a warm Lambda container
 * reuses the clients and connections of earlier invocations.
 */

import { AlertChannel, AlertDispatcher, ConsoleAlertChannel, SnsAlertChannel } from './alerts';
import { AlphaVantageClient } from './clients/alpha-vantage-client';
import { YahooChartClient } from './clients/yahoo-client';
import { loadConfigFromEnv, loadSymbolConfigs } from './config';
import { Coordinator } from './coordinator/coordinator';
import { ConfigurationError, getErrorMessage } from './errors';
import { MarketDataFetcher, ProviderRegistry } from './fetcher';
import { S3RawStore } from './raw-store/s3-raw-store';
import { DynamoStateStore } from './state/dynamo-state-store';
import { IngestionConfig, SymbolConfig } from './types';
import { getAlphaVantageApiKey, getPostgresPassword } from './utils/secrets';
import { PostgresWarehouse } from './warehouse/postgres-warehouse';

export class StockIngestionService {
    private readonly config: IngestionConfig;
    private readonly symbols: SymbolConfig[];
    private coordinator: Coordinator | null = null;
    private initializing: Promise<Coordinator> | null = null;

    constructor(config?: IngestionConfig, symbols?: SymbolConfig[]) {
        this.config = config ?? loadConfigFromEnv();
        this.symbols = symbols ?? loadSymbolConfigs(this.config);
    }

    get cancelMarginMs(): number {
        return this.config.cancelMarginMs;
    }

    /**
     * Coordinator for this container, created on first call
     */
    async getCoordinator(): Promise<Coordinator> {
        if (this.coordinator) {
            return this.coordinator;
        }
        if (!this.initializing) {
            this.initializing = this.initialize().catch((error: unknown) => {
                this.initializing = null;
                throw error;
            });
        }
        return this.initializing;
    }

    private async initialize(): Promise<Coordinator> {
        console.log('Initializing StockIngestionService...');
        const config = this.config;

        try {
            const providers = await this.createProviders();

            const rawStore = new S3RawStore({
                bucket: config.rawBucket,
                prefix: config.rawPrefix,
                region: config.awsRegion
            });

            const password = config.postgres.passwordSecret
                ? await getPostgresPassword(config.postgres.passwordSecret)
                : config.postgres.password;

            const warehouse = new PostgresWarehouse({ ...config.postgres, password });
            await warehouse.ensureSchema();

            const state = new DynamoStateStore({
                watermarkTable: config.watermarkTable,
                runRecordTable: config.runRecordTable,
                region: config.awsRegion
            });

            const channels: AlertChannel[] = [new ConsoleAlertChannel()];
            if (config.alertTopicArn) {
                channels.push(new SnsAlertChannel(config.alertTopicArn, config.awsRegion));
            }

            this.coordinator = new Coordinator({
                symbols: this.symbols,
                fetcher: new MarketDataFetcher(providers, rawStore),
                rawStore,
                warehouse,
                state,
                alerts: new AlertDispatcher(channels),
                options: {
                    retry: config.retry,
                    failurePolicy: config.failurePolicy,
                    workerConcurrency: config.workerConcurrency,
                    maxWindowsPerTick: config.maxWindowsPerTick,
                    closedWindowsOnly: config.closedWindowsOnly,
                    leaseTtlMs: config.leaseTtlMs
                }
            });

            console.log(`StockIngestionService initialized with ${this.symbols.length} symbols (${config.failurePolicy} policy)`);
            return this.coordinator;

        } catch (error) {
            console.error('Failed to initialize StockIngestionService:', error);
            if (error instanceof ConfigurationError) {
                throw error;
            }
            throw new Error(`Service initialization failed: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    private async createProviders(): Promise<ProviderRegistry> {
        const config = this.config;
        const providers: ProviderRegistry = {
            yahoo: new YahooChartClient({ timeoutMs: config.fetchTimeoutMs })
        };

        // The API key is only fetched when an enabled symbol needs it
        const needsAlphaVantage = this.symbols.some(symbol => symbol.enabled && symbol.provider === 'alphavantage');
        if (needsAlphaVantage) {
            if (!config.alphaVantageKeyParameter) {
                throw new ConfigurationError('ALPHA_VANTAGE_API_KEY_PARAMETER is required when a symbol uses the alphavantage provider');
            }
            const apiKey = await getAlphaVantageApiKey(config.alphaVantageKeyParameter);
            providers.alphavantage = new AlphaVantageClient(apiKey, {
                timeoutMs: config.fetchTimeoutMs,
                datatype: config.alphaVantageDatatype
            });
        }

        return providers;
    }
}
