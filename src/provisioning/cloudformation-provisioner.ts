import {
  CloudFormationClient,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStacksCommand,
  Stack,
  UpdateStackCommand
} from '@aws-sdk/client-cloudformation';
import { StackDescription, StackStatus } from '../types/index.js';
import { ProvisioningError, describeError } from '../errors/index.js';
import { CERTIFICATE_REGION, ExecutionContext, clientOptions } from '../config/credentials.js';
import { Clock, PollStatus, pollUntil } from '../orchestration/poller.js';
import { Logger } from '../utils/logger.js';
import { StackDeployRequest, StackProvisioner } from './types.js';

export interface CloudFormationProvisionerOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  logger?: Logger;
  /** Applied to every stack this provisioner creates */
  defaultTags?: Record<string, string>;
}

// A stack in one of these states cannot be updated, only deleted and created again
const RECREATE_STATUSES = new Set(['ROLLBACK_COMPLETE', 'ROLLBACK_FAILED', 'CREATE_FAILED']);

export function mapStackStatus(rawStatus: string): StackStatus {
  if (rawStatus === 'DELETE_COMPLETE') {
    return 'NOT_FOUND';
  }
  if (rawStatus.endsWith('_IN_PROGRESS')) {
    return 'IN_PROGRESS';
  }
  // UPDATE_ROLLBACK_COMPLETE keeps the previous, working resources and outputs
  if (rawStatus.endsWith('_FAILED') || rawStatus === 'ROLLBACK_COMPLETE') {
    return 'FAILED';
  }
  return 'COMPLETE';
}

function isMissingStackError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ValidationError' && error.message.includes('does not exist');
}

function isNoUpdatesError(error: unknown): boolean {
  return error instanceof Error && error.message.includes('No updates are to be performed');
}

/**
 * Stack lifecycle on CloudFormation. Always talks to us-east-1, where the
 * certificate for a CloudFront distribution has to be issued.
 */
export class CloudFormationProvisioner implements StackProvisioner {
  private client: CloudFormationClient;

  constructor(
    context: ExecutionContext,
    private readonly options: CloudFormationProvisionerOptions
  ) {
    this.client = new CloudFormationClient(clientOptions(context, CERTIFICATE_REGION));
  }

  async describeStack(stackName: string): Promise<StackDescription | undefined> {
    let stack: Stack | undefined;
    try {
      const result = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      stack = result.Stacks?.[0];
    } catch (error) {
      if (isMissingStackError(error)) {
        return undefined;
      }
      throw new ProvisioningError(`Failed to describe stack ${stackName}: ${describeError(error)}`, { cause: error });
    }

    if (!stack?.StackStatus) {
      return undefined;
    }

    const description = this.toDescription(stackName, stack);
    return description.status === 'NOT_FOUND' ? undefined : description;
  }

  async deployStack(request: StackDeployRequest): Promise<StackDescription> {
    const { stackName } = request;
    let existing = await this.describeStack(stackName);

    if (existing?.status === 'IN_PROGRESS') {
      this.options.logger?.debug(`Waiting for in-progress operation on ${stackName}`);
      existing = await this.waitForStack(stackName);
    }

    if (existing?.rawStatus && RECREATE_STATUSES.has(existing.rawStatus)) {
      this.options.logger?.info(`Stack ${stackName} is in ${existing.rawStatus}; deleting it before creating it again`);
      await this.deleteStack(stackName);
      existing = undefined;
    }

    const parameters = Object.entries(request.parameters).map(([ParameterKey, ParameterValue]) => ({
      ParameterKey,
      ParameterValue
    }));

    try {
      if (existing) {
        this.options.logger?.info(`Updating CloudFormation stack: ${stackName}`);
        await this.client.send(
          new UpdateStackCommand({
            StackName: stackName,
            TemplateBody: request.templateBody,
            Parameters: parameters,
            Capabilities: request.capabilities
          })
        );
      } else {
        this.options.logger?.info(`Creating CloudFormation stack: ${stackName}`);
        await this.client.send(
          new CreateStackCommand({
            StackName: stackName,
            TemplateBody: request.templateBody,
            Parameters: parameters,
            Capabilities: request.capabilities,
            Tags: this.createStackTags(request.tags)
          })
        );
      }
    } catch (error) {
      if (existing && isNoUpdatesError(error)) {
        this.options.logger?.debug(`No changes detected in CloudFormation stack ${stackName}`);
        return existing;
      }
      const verb = existing ? 'update' : 'create';
      throw new ProvisioningError(`Failed to ${verb} stack ${stackName}: ${describeError(error)}`, { cause: error });
    }

    const final = await this.waitForStack(stackName);
    if (!final) {
      throw new ProvisioningError(`Stack ${stackName} disappeared while it was being deployed`);
    }
    if (final.status !== 'COMPLETE' || final.rawStatus?.includes('ROLLBACK')) {
      throw new ProvisioningError(this.failureMessage(final), {
        remediation: 'Check the stack events in the CloudFormation console'
      });
    }
    return final;
  }

  async waitForStack(stackName: string): Promise<StackDescription | undefined> {
    const outcome = await pollUntil(
      async () => {
        const stack = await this.describeStack(stackName);
        if (stack?.status === 'IN_PROGRESS') {
          this.options.logger?.debug(`${stackName}: ${stack.rawStatus}`);
          return { status: PollStatus.Pending, value: stack };
        }
        return { status: PollStatus.Complete, value: stack };
      },
      {
        intervalMs: this.options.pollIntervalMs,
        timeoutMs: this.options.timeoutMs,
        clock: this.options.clock
      }
    );

    if (outcome.status === PollStatus.TimedOut) {
      throw new ProvisioningError(
        `Timed out waiting for stack ${stackName} after ${Math.round(outcome.elapsedMs / 1000)} seconds`
      );
    }
    return outcome.value;
  }

  async deleteStack(stackName: string): Promise<boolean> {
    let existing = await this.describeStack(stackName);
    if (existing?.status === 'IN_PROGRESS') {
      existing = await this.waitForStack(stackName);
    }
    if (!existing) {
      return false;
    }

    try {
      this.options.logger?.info(`Deleting CloudFormation stack: ${stackName}`);
      await this.client.send(new DeleteStackCommand({ StackName: stackName }));
    } catch (error) {
      throw new ProvisioningError(`Failed to delete stack ${stackName}: ${describeError(error)}`, { cause: error });
    }

    const final = await this.waitForStack(stackName);
    if (final) {
      throw new ProvisioningError(this.failureMessage(final), {
        remediation: 'Remove the resources that block deletion, then run cleanup again'
      });
    }
    return true;
  }

  private toDescription(stackName: string, stack: Stack): StackDescription {
    const rawStatus = stack.StackStatus ?? 'UNKNOWN';
    const outputs: Record<string, string> = {};
    for (const output of stack.Outputs ?? []) {
      if (output.OutputKey && output.OutputValue !== undefined) {
        outputs[output.OutputKey] = output.OutputValue;
      }
    }

    return {
      stackName: stack.StackName ?? stackName,
      status: mapStackStatus(rawStatus),
      rawStatus,
      statusReason: stack.StackStatusReason,
      outputs,
      createdAt: stack.CreationTime,
      updatedAt: stack.LastUpdatedTime
    };
  }

  private failureMessage(stack: StackDescription): string {
    const reason = stack.statusReason ? `: ${stack.statusReason}` : '';
    return `Stack ${stack.stackName} ended in ${stack.rawStatus ?? stack.status}${reason}`;
  }

  private createStackTags(extra: Record<string, string> = {}): Array<{ Key: string; Value: string }> {
    const tags = [{ Key: 'ManagedBy', Value: 'static-site-deployer' }];

    Object.entries({ ...this.options.defaultTags, ...extra }).forEach(([key, value]) => {
      tags.push({ Key: key, Value: value });
    });

    return tags;
  }
}
