import { ResidueKind } from '../types/index.js';

export interface SiteDeployErrorOptions {
  remediation?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the deployer reports to the operator.
 * `code` is stable and safe to match on; `remediation` is a one-line hint.
 */
export abstract class SiteDeployError extends Error {
  abstract readonly code: string;
  readonly remediation?: string;

  constructor(message: string, options: SiteDeployErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.remediation = options.remediation;
  }
}

export class InvalidInputError extends SiteDeployError {
  readonly code = 'INVALID_INPUT';
}

export class PrerequisiteMissingError extends SiteDeployError {
  readonly code = 'PREREQUISITE_MISSING';
}

export class ProvisioningError extends SiteDeployError {
  readonly code = 'PROVISIONING_FAILED';
}

export class DeploymentExhaustedError extends SiteDeployError {
  readonly code = 'DEPLOYMENT_EXHAUSTED';
  readonly attempts: number;

  constructor(domainName: string, attempts: number, cause?: unknown) {
    super(`Phase 2 deployment for ${domainName} failed after ${attempts} attempts`, {
      cause,
      remediation:
        'This is usually DNS propagation delay. Wait about 30 minutes, check that the nameservers are set at your registrar, then run the deployment again.'
    });
    this.attempts = attempts;
  }
}

/**
 * Reported when teardown cannot prove a resource is gone. Not thrown.
 */
export class TeardownResidueWarning {
  constructor(
    readonly kind: ResidueKind,
    readonly resourceId: string,
    readonly message: string
  ) {}
}

export function isSiteDeployError(error: unknown): error is SiteDeployError {
  return error instanceof SiteDeployError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
