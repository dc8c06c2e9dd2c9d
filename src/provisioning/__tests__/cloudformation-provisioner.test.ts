import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStacksCommand,
  UpdateStackCommand
} from '@aws-sdk/client-cloudformation';
import { CloudFormationProvisioner, mapStackStatus } from '../cloudformation-provisioner.js';
import { ProvisioningError } from '../../errors/index.js';
import { Clock } from '../../orchestration/poller.js';

const send = vi.hoisted(() => vi.fn());

vi.mock('@aws-sdk/client-cloudformation', async importOriginal => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-cloudformation')>()),
  CloudFormationClient: vi.fn(function () {
    return { send };
  })
}));

const STACK = 'website-example-com-phase2';

function stackResponse(status: string, outputs: Record<string, string> = {}, reason?: string) {
  return {
    Stacks: [
      {
        StackName: STACK,
        StackStatus: status,
        StackStatusReason: reason,
        CreationTime: new Date('2024-01-01T00:00:00Z'),
        Outputs: Object.entries(outputs).map(([OutputKey, OutputValue]) => ({ OutputKey, OutputValue }))
      }
    ]
  };
}

function missingStack(): Error {
  return Object.assign(new Error(`Stack with id ${STACK} does not exist`), { name: 'ValidationError' });
}

function commandAt(index: number): unknown {
  return send.mock.calls[index][0];
}

describe('mapStackStatus', () => {
  it.each([
    ['CREATE_COMPLETE', 'COMPLETE'],
    ['UPDATE_COMPLETE', 'COMPLETE'],
    ['IMPORT_COMPLETE', 'COMPLETE'],
    ['CREATE_IN_PROGRESS', 'IN_PROGRESS'],
    ['UPDATE_ROLLBACK_IN_PROGRESS', 'IN_PROGRESS'],
    ['DELETE_IN_PROGRESS', 'IN_PROGRESS'],
    ['CREATE_FAILED', 'FAILED'],
    ['DELETE_FAILED', 'FAILED'],
    ['ROLLBACK_COMPLETE', 'FAILED'],
    ['UPDATE_ROLLBACK_COMPLETE', 'COMPLETE'],
    ['UPDATE_ROLLBACK_FAILED', 'FAILED'],
    ['DELETE_COMPLETE', 'NOT_FOUND']
  ])('should map %s to %s', (raw, expected) => {
    expect(mapStackStatus(raw)).toBe(expected);
  });
});

describe('CloudFormationProvisioner', () => {
  let provisioner: CloudFormationProvisioner;
  let now: number;
  let sleeps: number[];

  beforeEach(() => {
    now = 0;
    sleeps = [];
    const clock: Clock = {
      now: () => now,
      sleep: async ms => {
        sleeps.push(ms);
        now += ms;
      }
    };
    provisioner = new CloudFormationProvisioner(
      { region: 'eu-west-1' },
      { pollIntervalMs: 10_000, timeoutMs: 25_000, clock, defaultTags: { Team: 'web' } }
    );
  });

  describe('describeStack', () => {
    it('should return undefined for a stack that does not exist', async () => {
      send.mockRejectedValueOnce(missingStack());

      await expect(provisioner.describeStack(STACK)).resolves.toBeUndefined();
      expect(commandAt(0)).toBeInstanceOf(DescribeStacksCommand);
    });

    it('should map status and outputs', async () => {
      send.mockResolvedValueOnce(stackResponse('CREATE_COMPLETE', { BucketName: 'example.com' }));

      await expect(provisioner.describeStack(STACK)).resolves.toEqual({
        stackName: STACK,
        status: 'COMPLETE',
        rawStatus: 'CREATE_COMPLETE',
        statusReason: undefined,
        outputs: { BucketName: 'example.com' },
        createdAt: new Date('2024-01-01T00:00:00Z'),
        updatedAt: undefined
      });
    });

    it('should treat a deleted stack as missing', async () => {
      send.mockResolvedValueOnce(stackResponse('DELETE_COMPLETE'));
      await expect(provisioner.describeStack(STACK)).resolves.toBeUndefined();
    });

    it('should wrap other failures', async () => {
      send.mockRejectedValueOnce(new Error('Rate exceeded'));
      await expect(provisioner.describeStack(STACK)).rejects.toThrow(
        `Failed to describe stack ${STACK}: Rate exceeded`
      );
    });
  });

  describe('deployStack', () => {
    const request = {
      stackName: STACK,
      templateBody: '{}',
      parameters: { DomainName: 'example.com' },
      tags: { Domain: 'example.com' }
    };

    it('should create a missing stack and wait for it', async () => {
      send
        .mockRejectedValueOnce(missingStack())
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stackResponse('CREATE_IN_PROGRESS'))
        .mockResolvedValueOnce(stackResponse('CREATE_COMPLETE', { WebsiteURL: 'https://example.com' }));

      const result = await provisioner.deployStack({ ...request, capabilities: ['CAPABILITY_IAM'] });

      expect(result.status).toBe('COMPLETE');
      expect(result.outputs).toEqual({ WebsiteURL: 'https://example.com' });
      expect(sleeps).toEqual([10_000]);

      const create = commandAt(1);
      expect(create).toBeInstanceOf(CreateStackCommand);
      if (create instanceof CreateStackCommand) {
        expect(create.input).toEqual({
          StackName: STACK,
          TemplateBody: '{}',
          Parameters: [{ ParameterKey: 'DomainName', ParameterValue: 'example.com' }],
          Capabilities: ['CAPABILITY_IAM'],
          Tags: [
            { Key: 'ManagedBy', Value: 'static-site-deployer' },
            { Key: 'Team', Value: 'web' },
            { Key: 'Domain', Value: 'example.com' }
          ]
        });
      }
    });

    it('should update an existing stack', async () => {
      send
        .mockResolvedValueOnce(stackResponse('CREATE_COMPLETE'))
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stackResponse('UPDATE_COMPLETE'));

      const result = await provisioner.deployStack(request);

      expect(result.rawStatus).toBe('UPDATE_COMPLETE');
      expect(commandAt(1)).toBeInstanceOf(UpdateStackCommand);
    });

    it('should treat "no updates" as success', async () => {
      send
        .mockResolvedValueOnce(stackResponse('UPDATE_COMPLETE', { BucketName: 'example.com' }))
        .mockRejectedValueOnce(new Error('No updates are to be performed.'));

      const result = await provisioner.deployStack(request);

      expect(result.outputs).toEqual({ BucketName: 'example.com' });
      expect(send).toHaveBeenCalledTimes(2);
    });

    it('should fail when the stack rolls back', async () => {
      send
        .mockRejectedValueOnce(missingStack())
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(
          stackResponse('ROLLBACK_COMPLETE', {}, 'The following resource(s) failed to create: [SSLCertificate].')
        );

      const failure = provisioner.deployStack(request);

      await expect(failure).rejects.toBeInstanceOf(ProvisioningError);
      await expect(failure).rejects.toThrow(
        `Stack ${STACK} ended in ROLLBACK_COMPLETE: The following resource(s) failed to create: [SSLCertificate].`
      );
    });

    it('should update a stack whose earlier update rolled back', async () => {
      send
        .mockResolvedValueOnce(stackResponse('UPDATE_ROLLBACK_COMPLETE', { BucketName: 'example.com' }))
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stackResponse('UPDATE_COMPLETE', { BucketName: 'example.com' }));

      const result = await provisioner.deployStack(request);

      expect(result.rawStatus).toBe('UPDATE_COMPLETE');
      expect(commandAt(1)).toBeInstanceOf(UpdateStackCommand);
    });

    it('should fail when its own update rolls back', async () => {
      send
        .mockResolvedValueOnce(stackResponse('UPDATE_COMPLETE'))
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stackResponse('UPDATE_ROLLBACK_COMPLETE', {}, 'Resource update cancelled'));

      await expect(provisioner.deployStack(request)).rejects.toThrow(
        `Stack ${STACK} ended in UPDATE_ROLLBACK_COMPLETE: Resource update cancelled`
      );
    });

    it('should delete a rolled-back stack before creating it again', async () => {
      send
        .mockResolvedValueOnce(stackResponse('ROLLBACK_COMPLETE'))
        .mockResolvedValueOnce(stackResponse('ROLLBACK_COMPLETE'))
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(missingStack())
        .mockResolvedValueOnce({ StackId: 'stack-id' })
        .mockResolvedValueOnce(stackResponse('CREATE_COMPLETE'));

      await provisioner.deployStack(request);

      const commands = send.mock.calls.map(([command]) => command.constructor.name);
      expect(commands).toEqual([
        'DescribeStacksCommand',
        'DescribeStacksCommand',
        'DeleteStackCommand',
        'DescribeStacksCommand',
        'CreateStackCommand',
        'DescribeStacksCommand'
      ]);
    });

    it('should wrap a rejected create call', async () => {
      send.mockRejectedValueOnce(missingStack()).mockRejectedValueOnce(new Error('AccessDenied'));

      await expect(provisioner.deployStack(request)).rejects.toThrow(`Failed to create stack ${STACK}: AccessDenied`);
    });
  });

  describe('waitForStack', () => {
    it('should time out while the stack stays in progress', async () => {
      send.mockResolvedValue(stackResponse('CREATE_IN_PROGRESS'));

      await expect(provisioner.waitForStack(STACK)).rejects.toThrow(
        `Timed out waiting for stack ${STACK} after 30 seconds`
      );
      expect(sleeps).toEqual([10_000, 10_000, 10_000]);
    });
  });

  describe('deleteStack', () => {
    it('should report false when there is nothing to delete', async () => {
      send.mockRejectedValueOnce(missingStack());

      await expect(provisioner.deleteStack(STACK)).resolves.toBe(false);
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should delete and wait until the stack is gone', async () => {
      send
        .mockResolvedValueOnce(stackResponse('CREATE_COMPLETE'))
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce(stackResponse('DELETE_IN_PROGRESS'))
        .mockRejectedValueOnce(missingStack());

      await expect(provisioner.deleteStack(STACK)).resolves.toBe(true);
      expect(commandAt(1)).toBeInstanceOf(DeleteStackCommand);
    });

    it('should fail when deletion fails', async () => {
      send
        .mockResolvedValueOnce(stackResponse('CREATE_COMPLETE'))
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce(stackResponse('DELETE_FAILED', {}, 'Hosted zone is not empty'));

      await expect(provisioner.deleteStack(STACK)).rejects.toThrow(
        `Stack ${STACK} ended in DELETE_FAILED: Hosted zone is not empty`
      );
    });
  });
});
