import { PhaseId } from '../types/index.js';

/**
 * Names of every stack that may exist for a domain
 */
export interface StackNames {
  /** Phase 1: hosted zone */
  phase1: string;
  /** Phase 2: buckets, distribution, certificate and alias records */
  phase2: string;
  /** Single-stack layout used before the two-phase split */
  legacy: string;
}

/**
 * Deterministic naming for everything the deployer creates. Stack names are the
 * only index used to rediscover earlier deployments, so the mapping from domain
 * to name must never depend on anything but the domain and the prefix.
 */
export class StackNamingService {
  private readonly maxStackNameLength = 128;
  private readonly phaseSuffixLength = '-phase1'.length;

  constructor(private readonly prefix: string = 'website') {}

  /**
   * Generate all stack names for a domain
   * @param domainName - Validated domain name
   */
  stackNames(domainName: string): StackNames {
    return {
      phase1: this.phaseStackName(domainName, 1),
      phase2: this.phaseStackName(domainName, 2),
      legacy: this.legacyStackName(domainName)
    };
  }

  phaseStackName(domainName: string, phaseId: PhaseId): string {
    const base = this.validateAndTruncate(
      this.baseName(domainName),
      this.maxStackNameLength - this.phaseSuffixLength
    );
    return `${base}-phase${phaseId}`;
  }

  legacyStackName(domainName: string): string {
    return this.validateAndTruncate(this.baseName(domainName), this.maxStackNameLength);
  }

  /**
   * Primary bucket first, then the www redirect bucket
   */
  bucketNames(domainName: string): string[] {
    return [domainName, `www.${domainName}`];
  }

  private baseName(domainName: string): string {
    return this.sanitizeName(`${this.prefix}-${domainName.replace(/\./g, '-')}`);
  }

  /**
   * Sanitize name to be CloudFormation-compliant
   * - Remove invalid characters
   * - Replace consecutive hyphens with single hyphen
   * - Ensure it starts with a letter
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'site-' + sanitized;
    }

    return sanitized || 'site';
  }

  /**
   * Truncate name to fit the stack name limit, keeping it unique with a hash
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength).replace(/-+$/, '') + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // 32-bit
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

export function createNamingService(prefix?: string): StackNamingService {
  return new StackNamingService(prefix);
}
