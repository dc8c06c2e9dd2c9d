import inquirer from 'inquirer';
import { NameServerSet } from '../types/index.js';

/** The word an operator types to confirm teardown. Deliberately not "y" or "yes". */
export const TEARDOWN_CONFIRMATION = 'DELETE';

/**
 * Points where the deployment waits on a human decision
 */
export interface OperatorCheckpoint {
  /** Resolves once the operator says delegation is done; may wait indefinitely */
  acknowledgeDelegation(domainName: string, nameServers: NameServerSet): Promise<void>;
  /** The token the operator typed to confirm teardown */
  confirmTeardown(domainName: string): Promise<string>;
}

export class PromptCheckpoint implements OperatorCheckpoint {
  async acknowledgeDelegation(domainName: string): Promise<void> {
    await inquirer.prompt<{ delegated: string }>([
      {
        type: 'input',
        name: 'delegated',
        message: `Press Enter once the nameservers for ${domainName} are set at your registrar`
      }
    ]);
  }

  async confirmTeardown(domainName: string): Promise<string> {
    const answers = await inquirer.prompt<{ token: string }>([
      {
        type: 'input',
        name: 'token',
        message: `This deletes every resource for ${domainName}. Type ${TEARDOWN_CONFIRMATION} to continue:`
      }
    ]);
    return answers.token.trim();
  }
}

/**
 * Answers every checkpoint immediately. For --assume-delegated, --confirm and tests.
 */
export class AutoCheckpoint implements OperatorCheckpoint {
  constructor(private readonly teardownToken: string = TEARDOWN_CONFIRMATION) {}

  async acknowledgeDelegation(): Promise<void> {}

  async confirmTeardown(): Promise<string> {
    return this.teardownToken;
  }
}
