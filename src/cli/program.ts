import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { DeploymentResult, DeploymentStatus, PhaseId, SiteDeployConfig } from '../types/index.js';
import { InvalidInputError, describeError, isSiteDeployError } from '../errors/index.js';
import { loadConfig, renderDefaultConfig } from '../config/loader.js';
import { inspectCredentials, validateDomainName } from '../config/validator.js';
import { AwsCredentials } from '../config/types.js';
import { withCredentialScope } from '../config/credentials.js';
import { TemplateEngine, TemplateFormat } from '../templates/template-engine.js';
import { DeploymentOrchestrator } from '../orchestration/deployment-orchestrator.js';
import {
  AutoCheckpoint,
  OperatorCheckpoint,
  PromptCheckpoint,
  TEARDOWN_CONFIRMATION
} from '../orchestration/checkpoint.js';
import { TeardownReport } from '../orchestration/types.js';
import { LogSink, Logger } from '../utils/logger.js';

type GlobalOptions = {
  config?: string;
  region?: string;
  profile?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  verbose?: boolean;
};

export interface CliDependencies {
  createOrchestrator: typeof DeploymentOrchestrator.fromConfig;
  createCheckpoint: (unattended: boolean) => OperatorCheckpoint;
  /** Raw documents such as rendered templates */
  write: (text: string) => void;
  sink?: LogSink;
}

const defaultDependencies: CliDependencies = {
  createOrchestrator: (config, context, overrides) => DeploymentOrchestrator.fromConfig(config, context, overrides),
  createCheckpoint: unattended => (unattended ? new AutoCheckpoint() : new PromptCheckpoint()),
  write: text => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`)
};

function explicitCredentials(options: GlobalOptions): AwsCredentials | undefined {
  const { accessKeyId, secretAccessKey, sessionToken } = options;
  if (!accessKeyId && !secretAccessKey) {
    return undefined;
  }
  if (!accessKeyId || !secretAccessKey) {
    throw new InvalidInputError('--access-key-id and --secret-access-key must be given together');
  }
  return { accessKeyId, secretAccessKey, sessionToken };
}

async function resolveConfig(options: GlobalOptions): Promise<SiteDeployConfig> {
  const config = await loadConfig(options.config);
  return {
    ...config,
    aws: {
      region: options.region ?? config.aws.region,
      profile: options.profile ?? config.aws.profile
    }
  };
}

function parsePhase(value: string): PhaseId {
  if (value === '1') return 1;
  if (value === '2') return 2;
  throw new InvalidInputError(`Unknown phase: ${value}`, { remediation: 'Use 1 or 2' });
}

function parseFormat(value: string): TemplateFormat {
  if (value === 'json' || value === 'yaml') {
    return value;
  }
  throw new InvalidInputError(`Unknown template format: ${value}`, { remediation: 'Use json or yaml' });
}

function printDeploymentSummary(logger: Logger, result: DeploymentResult): void {
  logger.header('Deployment complete');
  logger.plain(`🌐 Website:       ${chalk.underline(result.outputs.websiteUrl)}`);
  logger.plain(`📦 Bucket:        ${result.outputs.bucketName}`);
  logger.plain(`🚀 Distribution:  ${result.outputs.distributionId}`);
  if (result.outputs.distributionDomainName) {
    logger.plain(`   CDN domain:    ${result.outputs.distributionDomainName}`);
  }
  logger.plain('🧭 Nameservers:');
  result.phase1.nameServers.forEach(ns => logger.plain(`   ${ns}`));
  logger.plain(chalk.gray(`⏱️  Deployment took ${result.metadata.durationMs ?? 0}ms`));
  logger.plain(chalk.gray(`🆔 Deployment ID: ${result.deploymentId}`));
}

function printStatus(logger: Logger, status: DeploymentStatus): void {
  logger.header(`Stacks for ${status.domainName}`);
  for (const stack of status.stacks) {
    const raw = stack.rawStatus ? ` (${stack.rawStatus})` : '';
    const colour = stack.status === 'COMPLETE' ? chalk.green : stack.status === 'FAILED' ? chalk.red : chalk.yellow;
    logger.plain(`${stack.stackName}: ${colour(stack.status)}${raw}`);
    for (const [key, value] of Object.entries(stack.outputs)) {
      logger.plain(`   ${key}: ${value}`);
    }
  }
}

function printTeardownReport(logger: Logger, report: TeardownReport): void {
  if (report.removed.length === 0) {
    logger.info(`Nothing left to remove for ${report.domainName}`);
  }
  for (const item of report.removed) {
    logger.plain(`  removed ${item.kind} ${item.id}${item.detail ? ` (${item.detail})` : ''}`);
  }
  if (report.residue.length === 0) {
    logger.success('Cleanup completed');
  } else {
    logger.warn(`Cleanup finished with ${report.residue.length} resource(s) still present`);
  }
}

export function createProgram(version: string, overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  const loggerFor = (options: GlobalOptions) =>
    new Logger('cli', { verbose: options.verbose ?? false, sink: deps.sink });

  const fail = (logger: Logger, error: unknown) => {
    logger.error(describeError(error));
    if (isSiteDeployError(error) && error.remediation) {
      logger.plain(chalk.yellow(`💡 ${error.remediation}`));
    }
    process.exit(1);
  };

  /**
   * Load configuration, scope credentials to this command and build the orchestrator
   */
  const withOrchestrator = async <T>(
    options: GlobalOptions,
    logger: Logger,
    checkpoint: OperatorCheckpoint,
    fn: (orchestrator: DeploymentOrchestrator) => Promise<T>
  ): Promise<T> => {
    const config = await resolveConfig(options);
    const credentials = explicitCredentials(options);
    if (credentials) {
      inspectCredentials(credentials).forEach(warning => logger.warn(warning));
    }

    return withCredentialScope(credentials, async scope => {
      const orchestrator = deps.createOrchestrator(
        config,
        { region: config.aws.region, profile: config.aws.profile, credentials: scope },
        { logger, checkpoint }
      );

      const spinner = ora('Checking AWS credentials...').start();
      try {
        const identity = await orchestrator.checkPrerequisites();
        spinner.succeed(`Authenticated as ${identity.arn}`);
      } catch (error) {
        spinner.fail('AWS credentials check failed');
        throw error;
      }

      return fn(orchestrator);
    });
  };

  program
    .name('static-site-deploy')
    .description('Deploy static websites to AWS with S3, CloudFront, Route 53 and ACM')
    .version(version)
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--region <region>', 'AWS region for S3 and STS calls')
    .option('--profile <profile>', 'AWS shared-config profile')
    .option('--access-key-id <id>', 'AWS access key id, used for this command only')
    .option('--secret-access-key <secret>', 'AWS secret access key, used for this command only')
    .option('--session-token <token>', 'AWS session token, used for this command only')
    .option('-v, --verbose', 'Enable verbose logging');

  program
    .command('deploy')
    .description('Create the hosted zone, then the bucket, distribution and certificate, then publish')
    .argument('<domain>', 'Domain name, e.g. example.com')
    .argument('[path]', 'Website directory; a sample page is published when omitted')
    .option('--assume-delegated', 'Do not wait for confirmation that the nameservers are set')
    .action(async (domain: string, path: string | undefined, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & { assumeDelegated?: boolean }>();
      const logger = loggerFor(options);
      try {
        const domainName = validateDomainName(domain);
        const result = await withOrchestrator(
          options,
          logger,
          deps.createCheckpoint(options.assumeDelegated ?? false),
          orchestrator => orchestrator.deploy({ domainName, websitePath: path })
        );
        printDeploymentSummary(logger, result);
      } catch (error) {
        fail(logger, error);
      }
    });

  program
    .command('publish')
    .description('Upload a directory to an existing deployment and invalidate the CDN cache')
    .argument('<domain>', 'Domain name')
    .argument('<path>', 'Website directory')
    .action(async (domain: string, path: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(options);
      try {
        const domainName = validateDomainName(domain);
        const result = await withOrchestrator(options, logger, deps.createCheckpoint(true), orchestrator =>
          orchestrator.publish(domainName, path)
        );
        if (result.invalidationId) {
          logger.info(`Invalidation ${result.invalidationId} submitted`);
        }
      } catch (error) {
        fail(logger, error);
      }
    });

  program
    .command('status')
    .description('Show the stacks of a deployment')
    .argument('<domain>', 'Domain name')
    .action(async (domain: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(options);
      try {
        const domainName = validateDomainName(domain);
        const status = await withOrchestrator(options, logger, deps.createCheckpoint(true), async orchestrator => {
          const spinner = ora('Checking deployment status...').start();
          try {
            const result = await orchestrator.status(domainName);
            spinner.succeed(`Status check completed for ${domainName}`);
            return result;
          } catch (error) {
            spinner.fail('Status check failed');
            throw error;
          }
        });
        printStatus(logger, status);
      } catch (error) {
        fail(logger, error);
      }
    });

  program
    .command('cleanup')
    .description('Delete every resource of a deployment')
    .argument('<domain>', 'Domain name')
    .option('--confirm <token>', `Skip the prompt; the token must be ${TEARDOWN_CONFIRMATION}`)
    .action(async (domain: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & { confirm?: string }>();
      const logger = loggerFor(options);
      try {
        const domainName = validateDomainName(domain);
        let token = options.confirm;
        if (token === undefined) {
          logger.warn(`This permanently deletes the buckets, distribution, certificate and hosted zone of ${domainName}`);
          token = await deps.createCheckpoint(false).confirmTeardown(domainName);
          if (token !== TEARDOWN_CONFIRMATION) {
            logger.info('Cleanup cancelled');
            return;
          }
        }

        const confirmed = token;
        const report = await withOrchestrator(options, logger, deps.createCheckpoint(true), orchestrator =>
          orchestrator.teardown(domainName, confirmed)
        );
        printTeardownReport(logger, report);
      } catch (error) {
        fail(logger, error);
      }
    });

  program
    .command('template')
    .description('Print the CloudFormation template of a phase')
    .argument('<phase>', 'Phase number: 1 (hosted zone) or 2 (site)')
    .option('--format <format>', 'json or yaml', 'json')
    .action((phase: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & { format: string }>();
      const logger = loggerFor(options);
      try {
        const body = new TemplateEngine().generateTemplate(parsePhase(phase), { format: parseFormat(options.format) });
        deps.write(body);
      } catch (error) {
        fail(logger, error);
      }
    });

  program
    .command('init')
    .description('Write a configuration file with the default settings')
    .option('-o, --output <path>', 'Output configuration file path', 'sitedeploy.yml')
    .option('-f, --force', 'Overwrite an existing file')
    .action((_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions & { output: string; force?: boolean }>();
      const logger = loggerFor(options);
      try {
        if (existsSync(options.output) && !options.force) {
          throw new InvalidInputError(`Configuration file already exists: ${options.output}`, {
            remediation: 'Pass --force to overwrite it'
          });
        }
        writeFileSync(options.output, renderDefaultConfig());
        logger.success(`Configuration file created: ${options.output}`);
        logger.plain(chalk.green('\nNext steps:'));
        logger.plain('1. Review the configuration file');
        logger.plain('2. Make sure your AWS credentials are configured');
        logger.plain(`3. Run: ${chalk.cyan('static-site-deploy deploy example.com ./public')}`);
      } catch (error) {
        fail(logger, error);
      }
    });

  return program;
}
