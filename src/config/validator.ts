import Joi from 'joi';
import { SiteDeployConfig } from '../types/index.js';
import { InvalidInputError } from '../errors/index.js';
import { AwsCredentials, ConfigValidationResult } from './types.js';

/**
 * Hostname grammar: one or more labels of letters, digits and inner hyphens
 * (1-63 chars each), then an alphabetic TLD of at least two characters.
 */
export const HOSTNAME_PATTERN =
  /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

const domainNameSchema = Joi.string()
  .trim()
  .lowercase()
  .max(253)
  .pattern(HOSTNAME_PATTERN)
  .required()
  .messages({
    'any.required': 'Domain name is required',
    'string.empty': 'Domain name is required',
    'string.max': 'Domain name must be no more than 253 characters long',
    'string.pattern.base': 'Invalid domain name format: {#value}'
  });

// Joi schema for AWSConfig
const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    })
});

// Joi schema for DeploymentSettings
const deploymentSettingsSchema = Joi.object({
  stack_prefix: Joi.string()
    .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
    .max(32)
    .default('website')
    .messages({
      'string.pattern.base': 'Stack prefix must start with a letter and contain only alphanumeric characters and hyphens',
      'string.max': 'Stack prefix must be no more than 32 characters long'
    }),
  poll_interval_seconds: Joi.number()
    .integer()
    .min(1)
    .max(300)
    .default(30)
    .messages({
      'number.min': 'Poll interval must be at least 1 second',
      'number.max': 'Poll interval must be no more than 300 seconds'
    }),
  stack_timeout_minutes: Joi.number()
    .integer()
    .min(1)
    .max(180)
    .default(60)
    .messages({
      'number.min': 'Stack timeout must be at least 1 minute',
      'number.max': 'Stack timeout must be no more than 180 minutes'
    }),
  probe_timeout_seconds: Joi.number()
    .integer()
    .min(1)
    .max(10)
    .default(10)
    .messages({
      'number.max': 'Propagation probe timeout must be no more than 10 seconds'
    }),
  tags: Joi.object()
    .pattern(Joi.string(), Joi.string())
    .optional()
    .messages({
      'object.pattern.match': 'Tags must be key-value pairs of strings'
    })
});

// Joi schema for PublishSettings
const publishSettingsSchema = Joi.object({
  delete_extraneous: Joi.boolean()
    .default(true)
    .messages({
      'boolean.base': 'delete_extraneous must be a boolean value'
    }),
  invalidation_paths: Joi.array()
    .items(Joi.string().pattern(/^\//))
    .min(1)
    .default(['/*'])
    .messages({
      'string.pattern.base': 'Invalidation paths must start with "/"'
    })
});

// Main SiteDeployConfig schema
const siteDeployConfigSchema = Joi.object<SiteDeployConfig>({
  aws: awsConfigSchema.default(),
  deployment: deploymentSettingsSchema.default(),
  publish: publishSettingsSchema.default()
}).unknown(false);

const accessKeyIdPattern = /^(AKIA|ASIA)[A-Z0-9]{16}$/;

/**
 * Validates and normalizes a domain name. Throws before anything touches AWS.
 */
export function validateDomainName(domainName: unknown): string {
  const result = domainNameSchema.validate(domainName);
  if (result.error) {
    throw new InvalidInputError(result.error.details.map(detail => detail.message).join('; '), {
      remediation: 'Use a fully qualified domain such as example.com'
    });
  }
  return result.value;
}

export function isValidDomainName(domainName: unknown): boolean {
  return domainNameSchema.validate(domainName).error === undefined;
}

/**
 * Validates a configuration object against the schema
 * @param config - The configuration object to validate
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = siteDeployConfigSchema.validate(config ?? {}, {
    abortEarly: false,
    allowUnknown: false
  });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates and normalizes a configuration, applying every default
 * @throws InvalidInputError if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): SiteDeployConfig {
  const result = siteDeployConfigSchema.validate(config ?? {}, {
    abortEarly: false,
    allowUnknown: false
  });

  if (result.error) {
    const errors = result.error.details.map(detail => detail.message);
    throw new InvalidInputError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.value;
}

export function defaultConfig(): SiteDeployConfig {
  return validateAndNormalizeConfig({});
}

/**
 * Format checks for explicitly supplied credentials. Unusual shapes only warn:
 * STS is the authority on whether they work.
 */
export function inspectCredentials(credentials: AwsCredentials): string[] {
  const warnings: string[] = [];

  if (!accessKeyIdPattern.test(credentials.accessKeyId)) {
    warnings.push('Access key format looks unusual (should start with AKIA or ASIA and be 20 characters)');
  }

  if (credentials.secretAccessKey.length !== 40) {
    warnings.push('Secret key length is unusual (should be 40 characters)');
  }

  return warnings;
}

export function getConfigSchema() {
  return siteDeployConfigSchema;
}
