import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';

/**
 * Properties for StorageConstruct
 */
export interface StorageConstructProps {
    /**
     * Environment name (dev, staging, prod)
     * Used for resource name prefixing and tagging
     */
    environment?: string;

    /**
     * Optional prefix for table names
     * If not provided, will be derived from environment
     */
    tableNamePrefix?: string;
}

/**
 * StorageConstruct
 *
 * Durable state for the ingestion pipeline:
 * - Raw bucket: provider payloads exactly as fetched, never overwritten
 * - Watermark table (pk: symbol): per-symbol watermark, version and lease
 * - Run record table (pk: symbol, sk: <windowStart>#<startedAt>#<runId>): one item per attempt
 *
 * Everything is retained on stack deletion.
 */
export class StorageConstruct extends Construct {
    public readonly rawBucket: s3.Bucket;

    public readonly watermarkTable: dynamodb.Table;

    public readonly runRecordTable: dynamodb.Table;

    constructor(scope: Construct, id: string, props?: StorageConstructProps) {
        super(scope, id);

        const environment = props?.environment || 'dev';
        const prefix = props?.tableNamePrefix || `${environment}-stocklake-`;

        this.rawBucket = new s3.Bucket(this, 'RawBucket', {
            versioned: true,
            encryption: s3.BucketEncryption.S3_MANAGED,
            blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
            enforceSSL: true,
            removalPolicy: cdk.RemovalPolicy.RETAIN
        });

        this.watermarkTable = new dynamodb.Table(this, 'WatermarkTable', {
            tableName: `${prefix}watermarks`,
            partitionKey: {
                name: 'symbol',
                type: dynamodb.AttributeType.STRING
            },
            billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
            removalPolicy: cdk.RemovalPolicy.RETAIN,
            pointInTimeRecovery: true
        });

        this.runRecordTable = new dynamodb.Table(this, 'RunRecordTable', {
            tableName: `${prefix}run-records`,
            partitionKey: {
                name: 'symbol',
                type: dynamodb.AttributeType.STRING
            },
            sortKey: {
                name: 'sk',
                type: dynamodb.AttributeType.STRING
            },
            billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
            removalPolicy: cdk.RemovalPolicy.RETAIN,
            pointInTimeRecovery: true
        });

        for (const resource of [this.rawBucket, this.watermarkTable, this.runRecordTable]) {
            cdk.Tags.of(resource).add('Environment', environment);
            cdk.Tags.of(resource).add('ManagedBy', 'CDK');
            cdk.Tags.of(resource).add('Component', 'Storage');
        }

        new cdk.CfnOutput(this, 'RawBucketName', {
            value: this.rawBucket.bucketName,
            description: 'S3 bucket holding raw provider payloads',
            exportName: `${environment}-StockLakeRawBucketName`,
        });

        new cdk.CfnOutput(this, 'WatermarkTableName', {
            value: this.watermarkTable.tableName,
            description: 'DynamoDB table holding per-symbol watermarks',
            exportName: `${environment}-StockLakeWatermarkTableName`,
        });

        new cdk.CfnOutput(this, 'RunRecordTableName', {
            value: this.runRecordTable.tableName,
            description: 'DynamoDB table holding run records',
            exportName: `${environment}-StockLakeRunRecordTableName`,
        });
    }
}
