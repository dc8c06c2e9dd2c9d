import { PrerequisiteMissingError } from '../errors/index.js';
import { AwsCredentials } from './types.js';

/**
 * Holds explicitly supplied credentials for the length of one command.
 * Once cleared the scope refuses to hand them out again, so a client that
 * outlives the command fails instead of silently reusing them.
 */
export class CredentialScope {
  private credentials: AwsCredentials | undefined;

  constructor(credentials: AwsCredentials) {
    this.credentials = { ...credentials };
  }

  get active(): boolean {
    return this.credentials !== undefined;
  }

  resolve(): AwsCredentials {
    if (!this.credentials) {
      throw new PrerequisiteMissingError('Credential scope has already been cleared');
    }
    return { ...this.credentials };
  }

  clear(): void {
    this.credentials = undefined;
  }
}

/**
 * Everything an AWS client needs to know about where and as whom it runs.
 * Passed explicitly; the process environment is never modified.
 */
export interface ExecutionContext {
  region: string;
  profile?: string;
  credentials?: CredentialScope;
}

export interface AwsClientOptions {
  region: string;
  profile?: string;
  credentials?: () => Promise<AwsCredentials>;
}

export function clientOptions(context: ExecutionContext, region: string = context.region): AwsClientOptions {
  const scope = context.credentials;
  return {
    region,
    profile: context.profile,
    credentials: scope ? async () => scope.resolve() : undefined
  };
}

/**
 * Run `fn` with a credential scope that is cleared on every exit path:
 * normal return, thrown error, and SIGINT.
 */
export async function withCredentialScope<T>(
  credentials: AwsCredentials | undefined,
  fn: (scope: CredentialScope | undefined) => Promise<T>
): Promise<T> {
  const scope = credentials ? new CredentialScope(credentials) : undefined;
  const onInterrupt = () => {
    scope?.clear();
    process.exit(130);
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await fn(scope);
  } finally {
    scope?.clear();
    process.removeListener('SIGINT', onInterrupt);
  }
}

/** CloudFormation stacks holding a CloudFront certificate must live here. */
export const CERTIFICATE_REGION = 'us-east-1';
