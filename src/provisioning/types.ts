// Provisioning-specific types
import { StackDescription } from '../types/index.js';

export type StackCapability = 'CAPABILITY_IAM' | 'CAPABILITY_NAMED_IAM';

export interface StackDeployRequest {
  stackName: string;
  templateBody: string;
  parameters: Record<string, string>;
  capabilities?: StackCapability[];
  tags?: Record<string, string>;
}

/**
 * Cloud Resource Provisioner: creates, updates and deletes stacks.
 * `deployStack` and `deleteStack` block until the stack reaches a terminal
 * state and raise ProvisioningError when that state is a failure.
 */
export interface StackProvisioner {
  /** `undefined` when the stack does not exist or was deleted */
  describeStack(stackName: string): Promise<StackDescription | undefined>;
  deployStack(request: StackDeployRequest): Promise<StackDescription>;
  /** Wait out an in-progress operation; returns the terminal description */
  waitForStack(stackName: string): Promise<StackDescription | undefined>;
  /** `false` when there was nothing to delete */
  deleteStack(stackName: string): Promise<boolean>;
}

export interface SyncOptions {
  deleteExtraneous: boolean;
}

export interface SyncResult {
  uploaded: string[];
  deleted: string[];
}

export interface ObjectStore {
  bucketExists(bucketName: string): Promise<boolean>;
  /** Remove every object version and delete marker; returns how many went */
  emptyBucket(bucketName: string): Promise<number>;
  syncDirectory(bucketName: string, localPath: string, options: SyncOptions): Promise<SyncResult>;
  putObject(bucketName: string, key: string, body: string, contentType: string): Promise<void>;
}

export interface HostedZoneDirectory {
  /** Ids of every hosted zone whose name is exactly the domain */
  findHostedZoneIds(domainName: string): Promise<string[]>;
  /** Delete all record sets but the apex NS and SOA; returns "<name> <type>" of each */
  purgeExtraneousRecords(hostedZoneId: string, domainName: string): Promise<string[]>;
}

export interface CacheInvalidator {
  /** Returns the invalidation id */
  invalidate(distributionId: string, paths: string[]): Promise<string>;
}

export interface CallerIdentity {
  account: string;
  arn: string;
}

export interface IdentityVerifier {
  verify(): Promise<CallerIdentity>;
}
