import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import { Construct } from 'constructs';
import * as path from 'path';

interface LambdaStackProps extends cdk.StackProps {
  allowedOrigin: string;
  policyOverrides?: string; // JSON, per-channel policy fields
}

export class LambdaStack extends cdk.Stack {
  public readonly quoteApiHandler: lambda.Function;

  constructor(scope: Construct, id: string, props: LambdaStackProps) {
    super(scope, id, props);

    const environment: Record<string, string> = {
      ALLOWED_ORIGIN: props.allowedOrigin,
      NODE_OPTIONS: '--enable-source-maps',
    };
    if (props.policyOverrides) {
      environment.PRICING_POLICY_OVERRIDES = props.policyOverrides;
    }

    // Common bundling options - resolve workspace packages
    const bundlingOptions: nodejs.BundlingOptions = {
      minify: true,
      sourceMap: true,
      // Resolve @channel-pricing/core from the monorepo
      tsconfig: path.join(__dirname, '../../tsconfig.json'),
      esbuildArgs: {
        '--resolve-extensions': '.ts,.js',
      },
    };

    // Quote API Lambda - stateless, so small and quick
    this.quoteApiHandler = new nodejs.NodejsFunction(this, 'QuoteApiHandler', {
      functionName: 'channel-pricing-quote-api',
      entry: path.join(__dirname, '../../packages/lambdas/quote-api/src/index.ts'),
      handler: 'handler',
      runtime: lambda.Runtime.NODEJS_20_X,
      timeout: cdk.Duration.seconds(10),
      memorySize: 256,
      environment,
      bundling: bundlingOptions,
      projectRoot: path.join(__dirname, '../..'),
    });

    // Outputs
    new cdk.CfnOutput(this, 'QuoteApiFunctionArn', {
      value: this.quoteApiHandler.functionArn,
    });
  }
}
