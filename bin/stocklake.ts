#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { StockLakeStack } from '../lib/stocklake-stack';

const app = new cdk.App();

// Deploy to us-west-2 using your AWS CLI configured account
new StockLakeStack(app, 'StockLakeStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: 'us-west-2'
  },
  description: 'StockLake - scheduled market data ingestion',
});
