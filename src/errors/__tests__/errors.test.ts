import { describe, it, expect } from 'vitest';
import {
  DeploymentExhaustedError,
  InvalidInputError,
  PrerequisiteMissingError,
  ProvisioningError,
  SiteDeployError,
  TeardownResidueWarning,
  describeError,
  isSiteDeployError
} from '../index.js';

describe('error taxonomy', () => {
  it('should give each class a stable code and name', () => {
    expect(new InvalidInputError('bad').code).toBe('INVALID_INPUT');
    expect(new PrerequisiteMissingError('no creds').code).toBe('PREREQUISITE_MISSING');
    expect(new ProvisioningError('stack failed').code).toBe('PROVISIONING_FAILED');
    expect(new ProvisioningError('stack failed').name).toBe('ProvisioningError');
  });

  it('should keep remediation and cause', () => {
    const cause = new Error('throttled');
    const error = new ProvisioningError('Failed to create stack', { remediation: 'Try again', cause });

    expect(error.remediation).toBe('Try again');
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(SiteDeployError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should describe exhaustion with the attempt count and a propagation hint', () => {
    const last = new ProvisioningError('certificate validation timed out');
    const error = new DeploymentExhaustedError('example.com', 3, last);

    expect(error.code).toBe('DEPLOYMENT_EXHAUSTED');
    expect(error.message).toBe('Phase 2 deployment for example.com failed after 3 attempts');
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(last);
    expect(error.remediation).toContain('30 minutes');
  });

  it('should recognise its own errors only', () => {
    expect(isSiteDeployError(new InvalidInputError('x'))).toBe(true);
    expect(isSiteDeployError(new Error('x'))).toBe(false);
    expect(isSiteDeployError('x')).toBe(false);
  });

  it('should describe arbitrary thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });

  it('should model residue as a value', () => {
    const warning = new TeardownResidueWarning('hosted-zone', 'Z123', 'still there');
    expect(warning).toEqual({ kind: 'hosted-zone', resourceId: 'Z123', message: 'still there' });
    expect(warning).not.toBeInstanceOf(Error);
  });
});
