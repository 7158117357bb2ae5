import { CloudFrontClient, CreateInvalidationCommand } from '@aws-sdk/client-cloudfront';
import { randomUUID } from 'node:crypto';
import type { Cdn } from '../types.js';

export class CloudFrontCdn implements Cdn {
  constructor(private readonly client: CloudFrontClient = new CloudFrontClient({})) {}

  async invalidate(distributionId: string, paths: readonly string[]): Promise<string> {
    const response = await this.client.send(new CreateInvalidationCommand({
      DistributionId: distributionId,
      InvalidationBatch: {
        CallerReference: `publish-docs-${Date.now()}-${randomUUID()}`,
        Paths: {
          Quantity: paths.length,
          Items: [...paths],
        },
      },
    }));

    const invalidationId = response.Invalidation?.Id;
    if (!invalidationId) {
      throw new Error(`CloudFront accepted no invalidation for distribution ${distributionId}`);
    }
    return invalidationId;
  }
}
