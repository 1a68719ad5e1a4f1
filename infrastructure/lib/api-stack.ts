import * as cdk from 'aws-cdk-lib';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import { Construct } from 'constructs';

interface ApiStackProps extends cdk.StackProps {
  quoteApiHandler: lambda.Function;
  allowedOrigin: string;
}

/**
 * REST API in front of the quote Lambda.
 * Every /pricing path goes to the one handler, which does its own routing.
 */
export class ApiStack extends cdk.Stack {
  public readonly apiUrl: string;

  constructor(scope: Construct, id: string, props: ApiStackProps) {
    super(scope, id, props);

    // REST API Gateway
    const api = new apigateway.RestApi(this, 'ChannelPricingApi', {
      restApiName: 'Channel Pricing API',
      description: 'Price quotes for marketplace channels',
      deployOptions: {
        stageName: 'prod',
        throttlingBurstLimit: 100,
        throttlingRateLimit: 50,
      },
      defaultCorsPreflightOptions: {
        allowOrigins: props.allowedOrigin === '*' ? apigateway.Cors.ALL_ORIGINS : [props.allowedOrigin],
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization'],
      },
    });

    // Lambda integration with proxy
    const lambdaIntegration = new apigateway.LambdaIntegration(props.quoteApiHandler, {
      allowTestInvoke: false,
      proxy: true,
    });

    const pricing = api.root.addResource('pricing');
    const proxyResource = pricing.addResource('{proxy+}');
    proxyResource.addMethod('ANY', lambdaIntegration);

    this.apiUrl = api.url;

    // Outputs
    new cdk.CfnOutput(this, 'ApiEndpoint', {
      value: api.url,
      exportName: 'ChannelPricingApiEndpoint',
    });

    new cdk.CfnOutput(this, 'ApiId', {
      value: api.restApiId,
      exportName: 'ChannelPricingApiId',
    });
  }
}
