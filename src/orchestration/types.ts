// Orchestration-specific types
import { RemovedItem } from '../types/index.js';
import { TeardownResidueWarning } from '../errors/index.js';
import { StackNamingService } from '../config/naming.js';
import { TemplateEngine } from '../templates/template-engine.js';
import {
  CacheInvalidator,
  HostedZoneDirectory,
  IdentityVerifier,
  ObjectStore,
  StackProvisioner
} from '../provisioning/types.js';
import { Logger } from '../utils/logger.js';
import { OperatorCheckpoint } from './checkpoint.js';
import { Clock } from './poller.js';
import { ProbeResult } from './propagation.js';

export interface TeardownReport {
  domainName: string;
  removed: RemovedItem[];
  residue: TeardownResidueWarning[];
}

export interface PropagationProbe {
  probe(domainName: string, nameServer: string, timeoutMs: number): Promise<ProbeResult>;
}

/**
 * Collaborators of the orchestrator. Each remote concern sits behind its own
 * interface so that a run can be replayed against in-memory fakes.
 */
export interface OrchestratorServices {
  provisioner: StackProvisioner;
  objectStore: ObjectStore;
  hostedZones: HostedZoneDirectory;
  invalidator: CacheInvalidator;
  identity: IdentityVerifier;
  checkpoint: OperatorCheckpoint;
  probe: PropagationProbe;
  clock: Clock;
  logger: Logger;
  templates: TemplateEngine;
  naming: StackNamingService;
}

export interface OrchestratorSettings {
  /** Region of the S3 and STS clients, reported in deployment metadata */
  region: string;
  probeTimeoutMs: number;
  deleteExtraneous: boolean;
  invalidationPaths: string[];
}
