// Template-specific types
import { PhaseId } from '../types/index.js';

export type TemplateValue =
  | string
  | number
  | boolean
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export interface CloudFormationResource {
  Type: string;
  DependsOn?: string | string[];
  Properties?: Record<string, TemplateValue>;
}

export interface CloudFormationParameter {
  Type: string;
  Description?: string;
  Default?: string;
  AllowedPattern?: string;
  ConstraintDescription?: string;
}

export interface CloudFormationOutput {
  Description?: string;
  Value: TemplateValue;
  Export?: { Name: TemplateValue };
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description: string;
  Parameters?: Record<string, CloudFormationParameter>;
  Resources: Record<string, CloudFormationResource>;
  Outputs?: Record<string, CloudFormationOutput>;
}

export interface TemplateGenerator {
  generate(phaseId: PhaseId): CloudFormationTemplate;
}
