import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { StockIngestionConstruct } from './constructs/stock-ingestion-construct';
import { StorageConstruct } from './constructs/storage-construct';

export interface StockLakeStackProps extends cdk.StackProps {
  /**
   * Pre-built code for the ingestion function (skips esbuild bundling)
   */
  ingestionCode?: lambda.Code;
}

export class StockLakeStack extends cdk.Stack {
  /**
   * Raw bucket and state tables
   */
  public readonly storage: StorageConstruct;

  /**
   * Ingestion Lambda, schedule and alert topic
   * Exposed for manual invocation
   */
  public readonly ingestion: StockIngestionConstruct;

  constructor(scope: Construct, id: string, props?: StockLakeStackProps) {
    super(scope, id, props);

    // Get environment from stack context (defaults to 'dev' if not provided)
    const environment = this.node.tryGetContext('environment') || 'dev';
    const pgHost = this.node.tryGetContext('pgHost') || 'localhost';
    const failurePolicy = this.node.tryGetContext('failurePolicy') === 'skip' ? 'skip' : 'block';

    this.storage = new StorageConstruct(this, 'Storage', {
      environment: environment
    });

    // The password secret exists outside CDK, like the API key parameter
    const passwordSecret = secretsmanager.Secret.fromSecretNameV2(
      this,
      'WarehousePasswordSecret',
      `/stocklake/${environment}/postgres`
    );

    this.ingestion = new StockIngestionConstruct(this, 'StockIngestion', {
      rawBucket: this.storage.rawBucket,
      watermarkTable: this.storage.watermarkTable,
      runRecordTable: this.storage.runRecordTable,
      warehouse: {
        host: pgHost,
        passwordSecret
      },
      environment: environment,
      failurePolicy,
      alphaVantageKeyParameterName: `/stocklake/${environment}/alpha-vantage-api-key`,
      code: props?.ingestionCode
    });
  }
}
