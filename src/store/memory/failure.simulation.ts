/**
 * Commit failure simulation for the in-memory store.
 *
 * Lets tests and local runs force a unit of work to roll back after its
 * work function has run, the same way a lost database connection would.
 * Only enabled in test/development environments.
 */

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';

const log = createServiceLogger('store-simulation');

export class SimulatedFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatedFailureError';
  }
}

export class CommitFailureSimulation {
  private remaining = 0;

  private isSimulationAllowed(): boolean {
    return config.isTest || config.isDevelopment;
  }

  /**
   * Fail the next `count` commits
   */
  failNextCommits(count = 1): void {
    if (!this.isSimulationAllowed()) {
      log.warn('Commit failure simulation not allowed in this environment');
      return;
    }
    this.remaining = count;
    log.debug({ count }, 'Commit failure simulation armed');
  }

  reset(): void {
    this.remaining = 0;
  }

  get pending(): number {
    return this.remaining;
  }

  /**
   * Throws when an armed failure is due
   */
  checkCommit(): void {
    if (this.remaining <= 0) {
      return;
    }
    this.remaining -= 1;
    throw new SimulatedFailureError('Simulated commit failure');
  }
}
