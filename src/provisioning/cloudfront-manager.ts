import { CloudFrontClient, CreateInvalidationCommand } from '@aws-sdk/client-cloudfront';
import { v4 as uuidv4 } from 'uuid';
import { ProvisioningError, describeError } from '../errors/index.js';
import { CERTIFICATE_REGION, ExecutionContext, clientOptions } from '../config/credentials.js';
import { CacheInvalidator } from './types.js';

export class CloudFrontManager implements CacheInvalidator {
  private client: CloudFrontClient;

  constructor(context: ExecutionContext) {
    this.client = new CloudFrontClient(clientOptions(context, CERTIFICATE_REGION));
  }

  async invalidate(distributionId: string, paths: string[]): Promise<string> {
    try {
      const result = await this.client.send(
        new CreateInvalidationCommand({
          DistributionId: distributionId,
          InvalidationBatch: {
            CallerReference: uuidv4(),
            Paths: { Quantity: paths.length, Items: paths }
          }
        })
      );

      const invalidationId = result.Invalidation?.Id;
      if (!invalidationId) {
        throw new Error('response carried no invalidation id');
      }
      return invalidationId;
    } catch (error) {
      throw new ProvisioningError(
        `Failed to invalidate CloudFront distribution ${distributionId}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }
}
