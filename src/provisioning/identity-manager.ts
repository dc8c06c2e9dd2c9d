import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { PrerequisiteMissingError, describeError } from '../errors/index.js';
import { ExecutionContext, clientOptions } from '../config/credentials.js';
import { CallerIdentity, IdentityVerifier } from './types.js';

/**
 * Confirms the credentials in the execution context are usable before
 * anything is provisioned.
 */
export class IdentityManager implements IdentityVerifier {
  private client: STSClient;

  constructor(context: ExecutionContext) {
    this.client = new STSClient(clientOptions(context));
  }

  async verify(): Promise<CallerIdentity> {
    try {
      const result = await this.client.send(new GetCallerIdentityCommand({}));
      if (!result.Account || !result.Arn) {
        throw new Error('caller identity response was incomplete');
      }
      return { account: result.Account, arn: result.Arn };
    } catch (error) {
      throw new PrerequisiteMissingError(`AWS credentials are not configured or invalid: ${describeError(error)}`, {
        cause: error,
        remediation:
          'Run `aws configure`, set AWS_PROFILE, or pass --access-key-id and --secret-access-key'
      });
    }
  }
}
