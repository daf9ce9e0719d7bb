import { LedgerSession, LedgerStore } from '../ledger.store';
import { CommitFailureSimulation } from './failure.simulation';
import { createEmptyState, MemoryLedgerSession, MemoryState } from './memory.session';

/**
 * In-process LedgerStore for tests and local runs.
 *
 * Units of work are serialised through a single promise chain. A unit of
 * work runs against a structured clone of the state; the clone replaces the
 * live state only when the work resolves and the commit is not failed.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: MemoryState = createEmptyState();
  private lock: Promise<void> = Promise.resolve();

  readonly simulation = new CommitFailureSimulation();

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      const draft = structuredClone(this.state);
      const result = await work(new MemoryLedgerSession(draft));
      this.simulation.checkCommit();
      this.state = draft;
      return result;
    });
  }

  execute<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
    return this.serialize(() => work(new MemoryLedgerSession(this.state)));
  }

  /**
   * Drop all data (test helper)
   */
  reset(): void {
    this.state = createEmptyState();
    this.simulation.reset();
  }
}
