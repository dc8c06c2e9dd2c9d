import { stringify as stringifyYaml } from 'yaml';
import { CloudFormationGenerator } from './cloudformation-generator.js';
import { CloudFormationTemplate, TemplateGenerator, TemplateValue } from './types.js';
import { PhaseId } from '../types/index.js';
import { ProvisioningError } from '../errors/index.js';

export type TemplateFormat = 'json' | 'yaml';

export interface TemplateOptions {
  format?: TemplateFormat;
  minify?: boolean;
  validate?: boolean;
}

const RESOURCE_TYPE_PATTERN = /^AWS::[A-Za-z0-9]+::[A-Za-z0-9]+$/;
const SUB_REFERENCE_PATTERN = /\$\{([^}!][^}]*)\}/g;

function isTemplateObject(value: TemplateValue): value is { [key: string]: TemplateValue } {
  return typeof value === 'object' && !Array.isArray(value);
}

export class TemplateEngine {
  private renderers: Map<TemplateFormat, (template: CloudFormationTemplate, minify: boolean) => string> = new Map();

  constructor(private readonly generator: TemplateGenerator = new CloudFormationGenerator()) {
    this.renderers.set('json', (template, minify) =>
      minify ? JSON.stringify(template) : JSON.stringify(template, null, 2)
    );
    this.renderers.set('yaml', template => stringifyYaml(template));
  }

  /**
   * Build the template object for a phase, validated
   */
  build(phaseId: PhaseId): CloudFormationTemplate {
    const template = this.generator.generate(phaseId);
    this.validateTemplate(template);
    return template;
  }

  /**
   * Render a phase template as a document body
   */
  generateTemplate(phaseId: PhaseId, options: TemplateOptions = {}): string {
    const format = options.format ?? 'json';
    const render = this.renderers.get(format);
    if (!render) {
      throw new ProvisioningError(`Unsupported template format: ${format}`);
    }

    const template = this.generator.generate(phaseId);
    if (options.validate ?? true) {
      this.validateTemplate(template);
    }

    return render(template, options.minify ?? false);
  }

  getSupportedFormats(): TemplateFormat[] {
    return Array.from(this.renderers.keys());
  }

  /**
   * Structural checks: version present, at least one resource, well-formed
   * resource types, and every Ref, Fn::GetAtt and Fn::Sub target declared.
   */
  validateTemplate(template: CloudFormationTemplate): boolean {
    const fail = (reason: string): never => {
      throw new ProvisioningError(`CloudFormation template validation failed: ${reason}`);
    };

    if (!template.AWSTemplateFormatVersion) {
      fail('Missing AWSTemplateFormatVersion');
    }

    const resourceNames = Object.keys(template.Resources);
    if (resourceNames.length === 0) {
      fail('Template must contain at least one resource');
    }

    const declared = new Set([...resourceNames, ...Object.keys(template.Parameters ?? {})]);
    const checkTarget = (target: string, context: string) => {
      if (!target.startsWith('AWS::') && !declared.has(target)) {
        fail(`${context} refers to undeclared name ${target}`);
      }
    };

    const visit = (value: TemplateValue, context: string): void => {
      if (Array.isArray(value)) {
        value.forEach(item => visit(item, context));
        return;
      }
      if (!isTemplateObject(value)) {
        return;
      }

      for (const [key, entry] of Object.entries(value)) {
        if (key === 'Ref' && typeof entry === 'string') {
          checkTarget(entry, context);
        } else if (key === 'Fn::GetAtt' && Array.isArray(entry) && typeof entry[0] === 'string') {
          checkTarget(entry[0], context);
        } else if (key === 'Fn::Sub' && typeof entry === 'string') {
          for (const match of entry.matchAll(SUB_REFERENCE_PATTERN)) {
            checkTarget(match[1].split('.')[0], context);
          }
        } else {
          visit(entry, context);
        }
      }
    };

    for (const [resourceName, resource] of Object.entries(template.Resources)) {
      if (!RESOURCE_TYPE_PATTERN.test(resource.Type)) {
        fail(`Resource ${resourceName} has invalid Type ${resource.Type}`);
      }
      for (const dependency of [resource.DependsOn ?? []].flat()) {
        checkTarget(dependency, `Resource ${resourceName}`);
      }
      if (resource.Properties) {
        visit(resource.Properties, `Resource ${resourceName}`);
      }
    }

    for (const [outputName, output] of Object.entries(template.Outputs ?? {})) {
      visit(output.Value, `Output ${outputName}`);
      if (output.Export) {
        visit(output.Export.Name, `Output ${outputName}`);
      }
    }

    return true;
  }
}
