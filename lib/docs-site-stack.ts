import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as ssm from 'aws-cdk-lib/aws-ssm';
import * as cloudfront from 'aws-cdk-lib/aws-cloudfront';
import * as origins from 'aws-cdk-lib/aws-cloudfront-origins';
import { parameterKeys } from './publisher/config.js';
import {
  defaultResolverConfig,
  generateUrlRewriteFunctionCode,
  type UrlResolverConfig,
} from './url-resolver.js';

export interface DocsSiteStackProps extends cdk.StackProps {
  /** Namespace of the parameter store keys (e.g., 'hla-compass') */
  readonly project: string;
  /** Deployment environment (e.g., 'dev', 'prod') */
  readonly environment: string;
  readonly resolverConfig?: UrlResolverConfig;
}

export class DocsSiteStack extends cdk.Stack {
  public readonly siteBucket: s3.Bucket;
  public readonly distribution: cloudfront.Distribution;

  constructor(scope: Construct, id: string, props: DocsSiteStackProps) {
    super(scope, id, props);

    const config = props.resolverConfig ?? defaultResolverConfig;
    const keys = parameterKeys(props.project, props.environment);

    // Private bucket holding the rendered site, read only through CloudFront
    this.siteBucket = new s3.Bucket(this, 'SiteBucket', {
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
    });

    // CloudFront Function resolving directory URLs to index documents
    const rewriteFunction = new cloudfront.Function(this, 'UrlRewriteFn', {
      code: cloudfront.FunctionCode.fromInline(generateUrlRewriteFunctionCode(config)),
      runtime: cloudfront.FunctionRuntime.JS_2_0,
      comment: `Appends ${config.defaultDocument} to directory-style request paths`,
    });

    this.distribution = new cloudfront.Distribution(this, 'Distribution', {
      defaultBehavior: {
        origin: origins.S3BucketOrigin.withOriginAccessControl(this.siteBucket),
        viewerProtocolPolicy: cloudfront.ViewerProtocolPolicy.REDIRECT_TO_HTTPS,
        functionAssociations: [{
          function: rewriteFunction,
          eventType: cloudfront.FunctionEventType.VIEWER_REQUEST,
        }],
        cachePolicy: cloudfront.CachePolicy.CACHING_OPTIMIZED,
        compress: true,
      },
      defaultRootObject: config.defaultDocument,
      comment: `${props.project} documentation (${props.environment})`,
    });

    // Read by the publisher to find where to sync and what to invalidate
    new ssm.StringParameter(this, 'SiteBucketParam', {
      parameterName: keys.bucket,
      stringValue: this.siteBucket.bucketName,
      description: 'Bucket the documentation site is published to',
    });

    new ssm.StringParameter(this, 'DistributionIdParam', {
      parameterName: keys.distributionId,
      stringValue: this.distribution.distributionId,
      description: 'CloudFront distribution serving the documentation site',
    });

    // Outputs
    new cdk.CfnOutput(this, 'DistributionDomainName', {
      value: this.distribution.distributionDomainName,
      description: 'CloudFront distribution domain name',
    });

    new cdk.CfnOutput(this, 'DistributionId', {
      value: this.distribution.distributionId,
      description: 'CloudFront distribution ID',
    });

    new cdk.CfnOutput(this, 'BucketName', {
      value: this.siteBucket.bucketName,
      description: 'S3 bucket name',
    });
  }
}
