// Core type definitions for the static site deployer

export type PhaseId = 1 | 2;

export type StackStatus = 'NOT_FOUND' | 'IN_PROGRESS' | 'COMPLETE' | 'FAILED';

export interface DeploymentTarget {
  domainName: string;
  websitePath?: string;
}

export interface PhaseStackHandle {
  phaseId: PhaseId;
  stackName: string;
  status: StackStatus;
}

/** Delegation hostnames for a hosted zone, in the order the provider returned them. */
export type NameServerSet = readonly string[];

export interface RetryState {
  attempt: number;
  readonly maxAttempts: number;
  readonly backoffSeconds: number;
}

export interface StackDescription {
  stackName: string;
  status: StackStatus;
  rawStatus?: string;
  statusReason?: string;
  outputs: Record<string, string>;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface Phase1Result {
  stack: PhaseStackHandle;
  nameServers: NameServerSet;
}

export interface DeploymentOutputs {
  websiteUrl: string;
  bucketName: string;
  distributionId: string;
  distributionDomainName?: string;
  certificateArn?: string;
}

export interface PublishResult {
  bucketName: string;
  uploaded: number;
  deleted: number;
  invalidationId?: string;
  sample: boolean;
}

export interface DeploymentMetadata {
  startedAt: Date;
  durationMs?: number;
  region: string;
}

export interface DeploymentResult {
  deploymentId: string;
  domainName: string;
  phase1: Phase1Result;
  outputs: DeploymentOutputs;
  publish: PublishResult;
  metadata: DeploymentMetadata;
}

export type RemovedItemKind = 'bucket-contents' | 'dns-record' | 'stack';

export interface RemovedItem {
  kind: RemovedItemKind;
  id: string;
  detail?: string;
}

export type ResidueKind = 'bucket' | 'hosted-zone';

export interface DeploymentStatus {
  domainName: string;
  stacks: StackDescription[];
}

export interface AWSConfig {
  region: string;
  profile?: string;
}

export interface DeploymentSettings {
  stack_prefix: string;
  poll_interval_seconds: number;
  stack_timeout_minutes: number;
  probe_timeout_seconds: number;
  tags?: Record<string, string>;
}

export interface PublishSettings {
  delete_extraneous: boolean;
  invalidation_paths: string[];
}

export interface SiteDeployConfig {
  aws: AWSConfig;
  deployment: DeploymentSettings;
  publish: PublishSettings;
}
