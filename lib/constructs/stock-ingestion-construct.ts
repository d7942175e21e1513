import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import { Construct } from 'constructs';
import * as path from 'path';

/**
 * Connection settings for the Postgres warehouse
 */
export interface WarehouseConnectionProps {
    host: string;
    port?: number;
    database?: string;
    user?: string;
    table?: string;

    /**
     * Secret holding the database password (plain, or JSON with a `password` field)
     */
    passwordSecret?: secretsmanager.ISecret;
}

/**
 * Properties for StockIngestionConstruct
 */
export interface StockIngestionConstructProps {
    rawBucket: s3.IBucket;
    watermarkTable: dynamodb.ITable;
    runRecordTable: dynamodb.ITable;
    warehouse: WarehouseConnectionProps;

    /**
     * Environment name (dev, staging, prod)
     * Used for naming and tagging
     */
    environment?: string;

    /**
     * 'block' (default) stops a symbol at a failed window; 'skip' records the gap and moves on
     */
    failurePolicy?: 'block' | 'skip';

    /**
     * SSM parameter holding the Alpha Vantage API key, for symbols configured with that provider
     */
    alphaVantageKeyParameterName?: string;

    /**
     * Pre-built function code. When omitted the handler is bundled from source with esbuild.
     */
    code?: lambda.Code;
}

/**
 * StockIngestionConstruct
 *
 * Creates the ingestion Lambda, its hourly EventBridge schedule and the SNS
 * topic that receives operator alerts for failed windows.
 *
 * Features:
 * - Hourly tick: every enabled symbol catches up on its due windows
 * - Backfill, status and blocked-window resolution through manual invocation
 * - Retries with exponential backoff inside the function
 */
export class StockIngestionConstruct extends Construct {
    /**
     * Lambda function for stock ingestion
     * Exposed for EventBridge scheduling and manual invocation
     */
    public readonly lambdaFunction: lambda.Function;

    /**
     * EventBridge rule for hourly scheduled execution
     */
    public readonly hourlyScheduleRule: events.Rule;

    /**
     * Topic for alerts about windows that failed permanently or exhausted their retries
     */
    public readonly alertTopic: sns.Topic;

    constructor(scope: Construct, id: string, props: StockIngestionConstructProps) {
        super(scope, id);

        const environment = props.environment || 'dev';

        this.alertTopic = new sns.Topic(this, 'AlertTopic', {
            topicName: `${environment}-stocklake-ingestion-alerts`,
            displayName: 'StockLake ingestion alerts'
        });

        const environmentVariables: Record<string, string> = {
            ENVIRONMENT: environment,
            RAW_BUCKET: props.rawBucket.bucketName,
            RAW_PREFIX: 'raw',
            WATERMARK_TABLE: props.watermarkTable.tableName,
            RUN_RECORD_TABLE: props.runRecordTable.tableName,
            PG_HOST: props.warehouse.host,
            PG_PORT: String(props.warehouse.port ?? 5432),
            PG_DATABASE: props.warehouse.database ?? 'postgres',
            PG_USER: props.warehouse.user ?? 'postgres',
            PG_TABLE: props.warehouse.table ?? 'stock_bars',
            FAILURE_POLICY: props.failurePolicy ?? 'block',
            ALERT_TOPIC_ARN: this.alertTopic.topicArn,

            // Node options for better performance
            NODE_OPTIONS: '--enable-source-maps',
        };
        if (props.warehouse.passwordSecret) {
            environmentVariables.PG_PASSWORD_SECRET = props.warehouse.passwordSecret.secretName;
        }
        if (props.alphaVantageKeyParameterName) {
            environmentVariables.ALPHA_VANTAGE_API_KEY_PARAMETER = props.alphaVantageKeyParameterName;
        }

        const functionProps = {
            functionName: `${environment}-stocklake-ingestion`,
            runtime: lambda.Runtime.NODEJS_20_X,
            architecture: lambda.Architecture.ARM_64,

            // Backfills run many windows per invocation; the handler cancels cleanly before this
            timeout: cdk.Duration.minutes(10),
            memorySize: 512,
            environment: environmentVariables,

            // Disable automatic retries (we handle retries in code)
            retryAttempts: 0,
            description: 'Ingests OHLCV bars into the raw store and the Postgres warehouse',
        };

        if (props.code) {
            this.lambdaFunction = new lambda.Function(this, 'StockIngestionFunction', {
                ...functionProps,
                code: props.code,
                handler: 'index.handler',
            });
        } else {
            this.lambdaFunction = new nodejs.NodejsFunction(this, 'StockIngestionFunction', {
                ...functionProps,
                entry: path.join(__dirname, '../../lambda/stock-ingestion/index.ts'),
                handler: 'handler',
                bundling: {
                    // External modules that should not be bundled (AWS SDK is provided by Lambda runtime)
                    externalModules: [
                        '@aws-sdk/client-dynamodb',
                        '@aws-sdk/client-s3',
                        '@aws-sdk/client-secrets-manager',
                        '@aws-sdk/client-sns',
                        '@aws-sdk/client-ssm',
                        '@aws-sdk/lib-dynamodb',
                        'pg-native',
                    ],
                    minify: true,
                    sourceMap: true,
                    target: 'es2022',
                    keepNames: true,

                    // Force local bundling to avoid Docker requirement
                    forceDockerBundling: false,
                },
            });
        }

        props.rawBucket.grantReadWrite(this.lambdaFunction);
        props.watermarkTable.grantReadWriteData(this.lambdaFunction);
        props.runRecordTable.grantReadWriteData(this.lambdaFunction);
        this.alertTopic.grantPublish(this.lambdaFunction);
        props.warehouse.passwordSecret?.grantRead(this.lambdaFunction);

        if (props.alphaVantageKeyParameterName) {
            ssm.StringParameter.fromSecureStringParameterAttributes(this, 'AlphaVantageKeyParameter', {
                parameterName: props.alphaVantageKeyParameterName,
            }).grantRead(this.lambdaFunction);
        }

        // Top of every hour; each tick catches up whatever is due
        this.hourlyScheduleRule = new events.Rule(this, 'HourlyScheduleRule', {
            ruleName: `${environment}-stocklake-ingestion-hourly`,
            description: 'Triggers the stock ingestion tick at the top of every hour',
            schedule: events.Schedule.cron({ minute: '0' }),
            enabled: true,
        });

        // Empty event triggers a tick
        this.hourlyScheduleRule.addTarget(new targets.LambdaFunction(this.lambdaFunction, {
            event: events.RuleTargetInput.fromObject({}),
            retryAttempts: 2,
            maxEventAge: cdk.Duration.hours(1),
        }));

        for (const resource of [this.lambdaFunction, this.hourlyScheduleRule, this.alertTopic]) {
            cdk.Tags.of(resource).add('Environment', environment);
            cdk.Tags.of(resource).add('ManagedBy', 'CDK');
            cdk.Tags.of(resource).add('Component', 'StockIngestion');
        }

        new cdk.CfnOutput(this, 'LambdaFunctionName', {
            value: this.lambdaFunction.functionName,
            description: 'Name of the stock ingestion Lambda function',
            exportName: `${environment}-StockIngestionFunctionName`,
        });

        new cdk.CfnOutput(this, 'AlertTopicArn', {
            value: this.alertTopic.topicArn,
            description: 'SNS topic for ingestion alerts',
            exportName: `${environment}-StockIngestionAlertTopicArn`,
        });
    }
}
