import { existsSync, statSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import {
  DeploymentOutputs,
  DeploymentResult,
  DeploymentStatus,
  DeploymentTarget,
  NameServerSet,
  Phase1Result,
  PhaseStackHandle,
  PublishResult,
  RemovedItem,
  RetryState,
  SiteDeployConfig,
  StackDescription
} from '../types/index.js';
import {
  DeploymentExhaustedError,
  InvalidInputError,
  ProvisioningError,
  TeardownResidueWarning
} from '../errors/index.js';
import { validateDomainName } from '../config/validator.js';
import { StackNamingService } from '../config/naming.js';
import { ExecutionContext } from '../config/credentials.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { PHASE1_OUTPUTS, PHASE2_OUTPUTS } from '../templates/cloudformation-generator.js';
import { renderSampleSite } from '../templates/sample-site.js';
import { CloudFormationProvisioner } from '../provisioning/cloudformation-provisioner.js';
import { S3Manager } from '../provisioning/s3-manager.js';
import { Route53Manager } from '../provisioning/route53-manager.js';
import { CloudFrontManager } from '../provisioning/cloudfront-manager.js';
import { IdentityManager } from '../provisioning/identity-manager.js';
import { CallerIdentity } from '../provisioning/types.js';
import { Logger } from '../utils/logger.js';
import { OperatorCheckpoint, PromptCheckpoint, TEARDOWN_CONFIRMATION } from './checkpoint.js';
import { DnsPropagationProbe } from './propagation.js';
import { Clock, systemClock } from './poller.js';
import { OrchestratorServices, OrchestratorSettings, TeardownReport } from './types.js';

export const MAX_PHASE2_ATTEMPTS = 3;
export const PHASE2_BACKOFF_SECONDS = 120;

export interface OrchestratorOverrides {
  checkpoint?: OperatorCheckpoint;
  logger?: Logger;
  clock?: Clock;
}

export function parseNameServers(output: string | undefined): NameServerSet {
  return (output ?? '')
    .split(',')
    .map(ns => ns.trim())
    .filter(ns => ns.length > 0);
}

/**
 * Drives the two-phase deployment of a static site and its teardown.
 *
 * Phase 1 creates the hosted zone and stops at a delegation checkpoint.
 * Phase 2 creates everything that depends on DNS (certificate validation in
 * particular), retrying while the new delegation propagates.
 */
export class DeploymentOrchestrator {
  constructor(
    private readonly services: OrchestratorServices,
    private readonly settings: OrchestratorSettings
  ) {}

  static fromConfig(
    config: SiteDeployConfig,
    context: ExecutionContext,
    overrides: OrchestratorOverrides = {}
  ): DeploymentOrchestrator {
    const logger = overrides.logger ?? new Logger('deploy');
    const clock = overrides.clock ?? systemClock;

    return new DeploymentOrchestrator(
      {
        provisioner: new CloudFormationProvisioner(context, {
          pollIntervalMs: config.deployment.poll_interval_seconds * 1000,
          timeoutMs: config.deployment.stack_timeout_minutes * 60 * 1000,
          clock,
          logger: logger.child('cloudformation'),
          defaultTags: config.deployment.tags
        }),
        objectStore: new S3Manager(context, logger.child('s3')),
        hostedZones: new Route53Manager(context, logger.child('route53')),
        invalidator: new CloudFrontManager(context),
        identity: new IdentityManager(context),
        checkpoint: overrides.checkpoint ?? new PromptCheckpoint(),
        probe: new DnsPropagationProbe(),
        clock,
        logger,
        templates: new TemplateEngine(),
        naming: new StackNamingService(config.deployment.stack_prefix)
      },
      {
        region: config.aws.region,
        probeTimeoutMs: config.deployment.probe_timeout_seconds * 1000,
        deleteExtraneous: config.publish.delete_extraneous,
        invalidationPaths: config.publish.invalidation_paths
      }
    );
  }

  get naming(): StackNamingService {
    return this.services.naming;
  }

  async checkPrerequisites(): Promise<CallerIdentity> {
    return this.services.identity.verify();
  }

  async deploy(target: DeploymentTarget): Promise<DeploymentResult> {
    const { clock, logger } = this.services;
    const domainName = validateDomainName(target.domainName);
    if (target.websitePath !== undefined) {
      this.assertDirectory(target.websitePath);
    }

    const deploymentId = uuidv4();
    const startedAt = clock.now();
    logger.header(`Deploying ${domainName}`);

    const phase1 = await this.runPhase1(domainName);
    const outputs = await this.runPhase2(domainName, phase1.stack);
    const publish =
      target.websitePath !== undefined
        ? await this.publish(domainName, target.websitePath, outputs)
        : await this.publishSample(domainName, outputs);

    return {
      deploymentId,
      domainName,
      phase1,
      outputs,
      publish,
      metadata: {
        startedAt: new Date(startedAt),
        durationMs: clock.now() - startedAt,
        region: this.settings.region
      }
    };
  }

  async runPhase1(domainInput: string): Promise<Phase1Result> {
    const { provisioner, logger } = this.services;
    const domainName = validateDomainName(domainInput);
    const stackName = this.services.naming.phaseStackName(domainName, 1);

    logger.header('Phase 1: hosted zone');
    let stack = await provisioner.describeStack(stackName);

    if (stack?.status === 'IN_PROGRESS') {
      logger.info(`Waiting for ${stackName} to finish its current operation`);
      stack = await provisioner.waitForStack(stackName);
    }

    if (stack?.status === 'FAILED') {
      throw new ProvisioningError(`Phase 1 stack ${stackName} is in ${stack.rawStatus ?? stack.status}`, {
        remediation: `Run cleanup for ${domainName}, then deploy again`
      });
    }

    if (stack) {
      logger.info(`Phase 1 stack ${stackName} already exists; reusing its hosted zone`);
    } else {
      stack = await provisioner.deployStack({
        stackName,
        templateBody: this.services.templates.generateTemplate(1),
        parameters: { DomainName: domainName },
        tags: { Domain: domainName, Phase: '1' }
      });
      logger.success(`Hosted zone created for ${domainName}`);
    }

    const nameServers = parseNameServers(stack.outputs[PHASE1_OUTPUTS.nameServers]);
    if (nameServers.length === 0) {
      throw new ProvisioningError(`Phase 1 stack ${stackName} reported no nameservers`, {
        remediation: 'Check the stack outputs in the CloudFormation console'
      });
    }

    await this.delegationCheckpoint(domainName, nameServers);

    return {
      stack: { phaseId: 1, stackName, status: 'COMPLETE' },
      nameServers
    };
  }

  async runPhase2(domainInput: string, phase1: PhaseStackHandle | undefined): Promise<DeploymentOutputs> {
    const { provisioner, logger, clock } = this.services;
    const domainName = validateDomainName(domainInput);

    if (!phase1 || phase1.phaseId !== 1 || phase1.status !== 'COMPLETE') {
      throw new InvalidInputError('Phase 2 needs a completed Phase 1 stack', {
        remediation: `Run deploy for ${domainName} to create the hosted zone first`
      });
    }

    const stackName = this.services.naming.phaseStackName(domainName, 2);
    const templateBody = this.services.templates.generateTemplate(2);
    const retry: RetryState = {
      attempt: 0,
      maxAttempts: MAX_PHASE2_ATTEMPTS,
      backoffSeconds: PHASE2_BACKOFF_SECONDS
    };

    logger.header('Phase 2: storage, CDN, certificate and DNS records');
    let lastFailure: ProvisioningError | undefined;

    while (retry.attempt < retry.maxAttempts) {
      retry.attempt++;
      logger.info(`Deploying ${stackName} (attempt ${retry.attempt} of ${retry.maxAttempts})`);

      let stack: StackDescription;
      try {
        stack = await provisioner.deployStack({
          stackName,
          templateBody,
          parameters: { DomainName: domainName, Phase1StackName: phase1.stackName },
          capabilities: ['CAPABILITY_IAM'],
          tags: { Domain: domainName, Phase: '2' }
        });
      } catch (error) {
        if (!(error instanceof ProvisioningError)) {
          throw error;
        }
        lastFailure = error;
        logger.warn(`Attempt ${retry.attempt} failed: ${error.message}`);

        if (retry.attempt < retry.maxAttempts) {
          logger.info(`DNS may still be propagating; retrying in ${retry.backoffSeconds} seconds`);
          await clock.sleep(retry.backoffSeconds * 1000);
        }
        continue;
      }

      logger.success(`Phase 2 complete for ${domainName}`);
      return this.extractOutputs(stack);
    }

    throw new DeploymentExhaustedError(domainName, retry.maxAttempts, lastFailure);
  }

  /**
   * Mirror a local directory into the site bucket and invalidate the CDN.
   * Without `outputs`, the bucket and distribution are read from the Phase 2 stack.
   */
  async publish(domainInput: string, websitePath: string, outputs?: DeploymentOutputs): Promise<PublishResult> {
    const domainName = validateDomainName(domainInput);
    this.assertDirectory(websitePath);
    const target = outputs ?? (await this.readDeployedOutputs(domainName));

    this.services.logger.header(`Publishing ${websitePath} to ${target.bucketName}`);
    const sync = await this.services.objectStore.syncDirectory(target.bucketName, websitePath, {
      deleteExtraneous: this.settings.deleteExtraneous
    });
    const invalidationId = await this.invalidate(target);

    this.services.logger.success(`Uploaded ${sync.uploaded.length} files, deleted ${sync.deleted.length}`);
    return {
      bucketName: target.bucketName,
      uploaded: sync.uploaded.length,
      deleted: sync.deleted.length,
      invalidationId,
      sample: false
    };
  }

  async status(domainInput: string): Promise<DeploymentStatus> {
    const domainName = validateDomainName(domainInput);
    const names = this.services.naming.stackNames(domainName);

    const stacks: StackDescription[] = [];
    for (const stackName of [names.phase1, names.phase2, names.legacy]) {
      const stack = await this.services.provisioner.describeStack(stackName);
      stacks.push(stack ?? { stackName, status: 'NOT_FOUND', outputs: {} });
    }

    return { domainName, stacks };
  }

  /**
   * Remove everything a deployment created. Safe to repeat: each step skips
   * what is already gone.
   */
  async teardown(domainInput: string, confirmationToken: string): Promise<TeardownReport> {
    const { objectStore, hostedZones, provisioner, logger, naming } = this.services;
    const domainName = validateDomainName(domainInput);

    if (confirmationToken !== TEARDOWN_CONFIRMATION) {
      throw new InvalidInputError(`Teardown of ${domainName} was not confirmed`, {
        remediation: `Type ${TEARDOWN_CONFIRMATION} exactly to confirm`
      });
    }

    logger.header(`Cleaning up ${domainName}`);
    const removed: RemovedItem[] = [];

    for (const bucketName of naming.bucketNames(domainName)) {
      if (await objectStore.bucketExists(bucketName)) {
        const count = await objectStore.emptyBucket(bucketName);
        if (count > 0) {
          removed.push({ kind: 'bucket-contents', id: bucketName, detail: `${count} object versions` });
        }
      }
    }

    for (const hostedZoneId of await hostedZones.findHostedZoneIds(domainName)) {
      const records = await hostedZones.purgeExtraneousRecords(hostedZoneId, domainName);
      records.forEach(record => removed.push({ kind: 'dns-record', id: record, detail: hostedZoneId }));
    }

    const names = naming.stackNames(domainName);
    for (const stackName of [names.phase2, names.phase1, names.legacy]) {
      if (await provisioner.deleteStack(stackName)) {
        logger.success(`Deleted stack ${stackName}`);
        removed.push({ kind: 'stack', id: stackName });
      }
    }

    const residue = await this.findResidue(domainName);
    residue.forEach(warning => logger.warn(warning.message));

    return { domainName, removed, residue };
  }

  private async delegationCheckpoint(domainName: string, nameServers: NameServerSet): Promise<void> {
    const { logger, checkpoint, probe } = this.services;

    logger.nameServerBanner(domainName, nameServers);
    await checkpoint.acknowledgeDelegation(domainName, nameServers);

    const result = await probe.probe(domainName, nameServers[0], this.settings.probeTimeoutMs);
    if (result.propagated) {
      logger.success(`${result.nameServer} answers for ${domainName}`);
    } else {
      logger.warn(`Could not confirm DNS propagation via ${result.nameServer} (${result.detail}); continuing`);
    }
  }

  private async publishSample(domainName: string, outputs: DeploymentOutputs): Promise<PublishResult> {
    this.services.logger.info('No website directory given; publishing a sample landing page');
    const html = await renderSampleSite(domainName);
    await this.services.objectStore.putObject(outputs.bucketName, 'index.html', html, 'text/html');
    const invalidationId = await this.invalidate(outputs);

    return { bucketName: outputs.bucketName, uploaded: 1, deleted: 0, invalidationId, sample: true };
  }

  private async invalidate(outputs: DeploymentOutputs): Promise<string | undefined> {
    if (this.settings.invalidationPaths.length === 0) {
      return undefined;
    }
    return this.services.invalidator.invalidate(outputs.distributionId, this.settings.invalidationPaths);
  }

  private async readDeployedOutputs(domainName: string): Promise<DeploymentOutputs> {
    const stackName = this.services.naming.phaseStackName(domainName, 2);
    const stack = await this.services.provisioner.describeStack(stackName);
    if (!stack || stack.status !== 'COMPLETE') {
      throw new InvalidInputError(`No completed deployment found for ${domainName}`, {
        remediation: `Run deploy for ${domainName} first`
      });
    }
    return this.extractOutputs(stack);
  }

  private extractOutputs(stack: StackDescription): DeploymentOutputs {
    const required = (key: string): string => {
      const value = stack.outputs[key];
      if (!value) {
        throw new ProvisioningError(`Stack ${stack.stackName} is missing output ${key}`);
      }
      return value;
    };

    return {
      websiteUrl: required(PHASE2_OUTPUTS.websiteUrl),
      bucketName: required(PHASE2_OUTPUTS.bucketName),
      distributionId: required(PHASE2_OUTPUTS.distributionId),
      distributionDomainName: stack.outputs[PHASE2_OUTPUTS.distributionDomainName],
      certificateArn: stack.outputs[PHASE2_OUTPUTS.certificateArn]
    };
  }

  private async findResidue(domainName: string): Promise<TeardownResidueWarning[]> {
    const residue: TeardownResidueWarning[] = [];

    for (const bucketName of this.services.naming.bucketNames(domainName)) {
      if (await this.services.objectStore.bucketExists(bucketName)) {
        residue.push(
          new TeardownResidueWarning('bucket', bucketName, `Bucket ${bucketName} still exists; delete it manually if it is not needed`)
        );
      }
    }

    for (const hostedZoneId of await this.services.hostedZones.findHostedZoneIds(domainName)) {
      residue.push(
        new TeardownResidueWarning(
          'hosted-zone',
          hostedZoneId,
          `Hosted zone ${hostedZoneId} for ${domainName} still exists and keeps incurring charges`
        )
      );
    }

    return residue;
  }

  private assertDirectory(websitePath: string): void {
    if (!existsSync(websitePath) || !statSync(websitePath).isDirectory()) {
      throw new InvalidInputError(`Website directory not found: ${websitePath}`, {
        remediation: 'Pass the path of the folder that holds index.html'
      });
    }
  }
}
