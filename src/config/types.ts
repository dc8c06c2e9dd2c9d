// Configuration-specific types
import { SiteDeployConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<SiteDeployConfig>;
  validate(config: unknown): ConfigValidationResult;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}
