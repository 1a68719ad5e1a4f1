#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { LambdaStack } from '../lib/lambda-stack';
import { ApiStack } from '../lib/api-stack';

const app = new cdk.App();

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'sa-east-1', // São Paulo
};

// CORS origin and policy overrides come from CDK context, e.g. -c allowedOrigin=https://...
const contextString = (key: string): string | undefined => {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value !== '' ? value : undefined;
};
const allowedOrigin = contextString('allowedOrigin') ?? '*';

// Lambda stack - quote API function
const lambdaStack = new LambdaStack(app, 'ChannelPricingLambdaStack', {
  env,
  allowedOrigin,
  policyOverrides: contextString('policyOverrides'),
});

// API Gateway stack
new ApiStack(app, 'ChannelPricingApiStack', {
  env,
  quoteApiHandler: lambdaStack.quoteApiHandler,
  allowedOrigin,
});

app.synth();
