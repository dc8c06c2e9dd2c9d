// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { SiteDeployConfig } from '../types/index.js';
import { InvalidInputError, describeError } from '../errors/index.js';
import { ConfigLoader, ConfigValidationResult } from './types.js';
import { defaultConfig, validateAndNormalizeConfig, validateConfig } from './validator.js';

export const DEFAULT_CONFIG_PATHS = [
  './sitedeploy.yml',
  './sitedeploy.yaml',
  './sitedeploy.json'
];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class SiteConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and parse configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   */
  async load(path: string): Promise<SiteDeployConfig> {
    if (!existsSync(path)) {
      throw new InvalidInputError(`Configuration file not found: ${path}`);
    }

    try {
      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
      }

      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig ?? {});
      return validateAndNormalizeConfig(configWithEnvVars);
    } catch (error) {
      throw new InvalidInputError(`Failed to load configuration from ${path}: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first configuration file that exists; defaults when there is none
   * @param searchPaths - Candidate paths, in priority order
   */
  async loadFromPaths(searchPaths: string[]): Promise<SiteDeployConfig> {
    for (const path of searchPaths) {
      if (existsSync(path)) {
        return this.load(path);
      }
    }
    return defaultConfig();
  }

  /**
   * Recursively resolve ${VAR_NAME} and ${VAR_NAME:-default_value} in string values
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isRecord(value)) {
      const result: ConfigRecord = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match: string, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset with no default: leave the placeholder for the validator to reject
      return match;
    });
  }
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): SiteConfigLoader {
  return new SiteConfigLoader(env);
}

/**
 * Load configuration from an explicit path, or from the standard locations
 */
export async function loadConfig(path?: string): Promise<SiteDeployConfig> {
  const loader = createConfigLoader();
  return path ? loader.load(path) : loader.loadFromPaths(DEFAULT_CONFIG_PATHS);
}

/**
 * Render the default configuration as a commented YAML document
 */
export function renderDefaultConfig(): string {
  return [
    '# Static site deployer configuration',
    `# Generated on ${new Date().toISOString()}`,
    '# CloudFormation, CloudFront and ACM calls always run in us-east-1.',
    '',
    stringifyYaml(defaultConfig())
  ].join('\n');
}
