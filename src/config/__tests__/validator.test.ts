import { describe, it, expect } from 'vitest';
import {
  defaultConfig,
  getConfigSchema,
  inspectCredentials,
  isValidDomainName,
  validateAndNormalizeConfig,
  validateConfig,
  validateDomainName
} from '../validator.js';
import { InvalidInputError } from '../../errors/index.js';

describe('Configuration Validator', () => {
  describe('validateDomainName', () => {
    it('should accept a plain domain', () => {
      expect(validateDomainName('example.com')).toBe('example.com');
    });

    it('should accept subdomains and hyphenated labels', () => {
      expect(validateDomainName('docs.my-site.co.uk')).toBe('docs.my-site.co.uk');
    });

    it('should trim and lower-case the input', () => {
      expect(validateDomainName('  Example.COM ')).toBe('example.com');
    });

    it.each([
      'localhost',
      'example',
      '-example.com',
      'example-.com',
      'exa_mple.com',
      'example.c0m',
      'example.c',
      'example..com',
      'http://example.com'
    ])('should reject %s', input => {
      expect(() => validateDomainName(input)).toThrow(InvalidInputError);
    });

    it('should reject labels longer than 63 characters', () => {
      expect(isValidDomainName(`${'a'.repeat(64)}.com`)).toBe(false);
      expect(isValidDomainName(`${'a'.repeat(63)}.com`)).toBe(true);
    });

    it('should reject names longer than 253 characters', () => {
      const label = 'a'.repeat(60);
      const name = `${label}.${label}.${label}.${label}.com`;
      expect(name.length).toBe(247);
      expect(isValidDomainName(name)).toBe(true);
      expect(isValidDomainName(`abcdef.${name}`)).toBe(false);
    });

    it('should report a missing domain as required', () => {
      expect(() => validateDomainName(undefined)).toThrow('Domain name is required');
      expect(() => validateDomainName('')).toThrow('Domain name is required');
    });

    it('should name the offending value and carry a remediation', () => {
      try {
        validateDomainName('not_a_domain');
        expect.fail('expected validation to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidInputError);
        if (error instanceof InvalidInputError) {
          expect(error.message).toBe('Invalid domain name format: not_a_domain');
          expect(error.code).toBe('INVALID_INPUT');
          expect(error.remediation).toBe('Use a fully qualified domain such as example.com');
        }
      }
    });

    it('should reject non-string input', () => {
      expect(isValidDomainName(42)).toBe(false);
    });
  });

  describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
      const result = validateConfig({
        aws: { region: 'eu-west-1', profile: 'sites' },
        deployment: {
          stack_prefix: 'site',
          poll_interval_seconds: 15,
          stack_timeout_minutes: 90,
          probe_timeout_seconds: 5,
          tags: { Team: 'web' }
        },
        publish: { delete_extraneous: false, invalidation_paths: ['/index.html', '/assets/*'] }
      });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should accept an empty configuration', () => {
      expect(validateConfig({}).valid).toBe(true);
      expect(validateConfig(undefined).valid).toBe(true);
    });

    it('should collect every error', () => {
      const result = validateConfig({
        aws: { region: 'nowhere' },
        deployment: { poll_interval_seconds: 0, probe_timeout_seconds: 11 }
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'AWS region must be a valid region identifier',
        'Poll interval must be at least 1 second',
        'Propagation probe timeout must be no more than 10 seconds'
      ]);
    });

    it('should reject a stack prefix that does not start with a letter', () => {
      const result = validateConfig({ deployment: { stack_prefix: '1site' } });
      expect(result.errors).toEqual([
        'Stack prefix must start with a letter and contain only alphanumeric characters and hyphens'
      ]);
    });

    it('should reject invalidation paths without a leading slash', () => {
      const result = validateConfig({ publish: { invalidation_paths: ['index.html'] } });
      expect(result.errors).toEqual(['Invalidation paths must start with "/"']);
    });

    it('should reject unknown top-level keys', () => {
      const result = validateConfig({ application: { name: 'legacy' } });
      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should fill in every default', () => {
      expect(validateAndNormalizeConfig({})).toEqual({
        aws: { region: 'us-east-1' },
        deployment: {
          stack_prefix: 'website',
          poll_interval_seconds: 30,
          stack_timeout_minutes: 60,
          probe_timeout_seconds: 10
        },
        publish: { delete_extraneous: true, invalidation_paths: ['/*'] }
      });
    });

    it('should keep explicit values next to defaults', () => {
      const config = validateAndNormalizeConfig({ deployment: { stack_prefix: 'blog' } });
      expect(config.deployment.stack_prefix).toBe('blog');
      expect(config.deployment.poll_interval_seconds).toBe(30);
    });

    it('should throw InvalidInputError listing the failures', () => {
      expect(() => validateAndNormalizeConfig({ deployment: { stack_timeout_minutes: 500 } })).toThrow(
        'Configuration validation failed:\nStack timeout must be no more than 180 minutes'
      );
    });
  });

  describe('defaultConfig', () => {
    it('should match the normalized empty configuration', () => {
      expect(defaultConfig()).toEqual(validateAndNormalizeConfig({}));
    });
  });

  describe('inspectCredentials', () => {
    it('should not warn about well-formed credentials', () => {
      expect(
        inspectCredentials({ accessKeyId: 'AKIAEXAMPLEEXAMPLE00', secretAccessKey: 'x'.repeat(40) })
      ).toEqual([]);
    });

    it('should warn about unusual shapes without rejecting them', () => {
      expect(inspectCredentials({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' })).toEqual([
        'Access key format looks unusual (should start with AKIA or ASIA and be 20 characters)',
        'Secret key length is unusual (should be 40 characters)'
      ]);
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the schema used for validation', () => {
      const schema = getConfigSchema();
      expect(schema.validate({ aws: { region: 'us-west-2' } }).error).toBeUndefined();
    });
  });
});
