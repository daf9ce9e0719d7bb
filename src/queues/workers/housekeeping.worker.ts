/**
 * Housekeeping Worker
 *
 * Runs scheduled maintenance against the ledger engines.
 */

import { Job, Worker } from 'bullmq';

import { createServiceLogger } from '../../observability/logger';
import { queueJobsTotal } from '../../observability/metrics';
import {
  HousekeepingJobData,
  HousekeepingJobResult,
  HousekeepingTask,
} from '../housekeeping.queue';
import { QUEUE_NAMES, WORKER_CONCURRENCY, queueConnection } from '../queue.config';

const log = createServiceLogger('housekeeping-worker');

/**
 * What the worker needs from the engines
 */
export interface HousekeepingTasks {
  expireReservations(): Promise<number>;
  failStaleCidRequests(): Promise<number>;
}

let housekeepingWorker: Worker<HousekeepingJobData, HousekeepingJobResult> | null = null;

/**
 * Process a housekeeping job
 */
export async function processHousekeepingJob(
  job: Pick<Job<HousekeepingJobData, HousekeepingJobResult>, 'data'>,
  tasks: HousekeepingTasks
): Promise<HousekeepingJobResult> {
  switch (job.data.task) {
    case HousekeepingTask.EXPIRE_RESERVATIONS: {
      const affected = await tasks.expireReservations();
      return { task: job.data.task, affected };
    }
    case HousekeepingTask.FAIL_STALE_CID_REQUESTS: {
      const affected = await tasks.failStaleCidRequests();
      return { task: job.data.task, affected };
    }
    default:
      throw new Error(`Unknown housekeeping task: ${String(job.data.task)}`);
  }
}

/**
 * Setup worker event handlers
 */
function setupWorkerEvents(worker: Worker<HousekeepingJobData, HousekeepingJobResult>): void {
  worker.on('completed', (job, result) => {
    queueJobsTotal.inc({ queue: QUEUE_NAMES.HOUSEKEEPING, status: 'completed' });
    log.debug({ jobId: job.id, task: result.task, affected: result.affected }, 'Job completed');
  });

  worker.on('failed', (job, err) => {
    queueJobsTotal.inc({ queue: QUEUE_NAMES.HOUSEKEEPING, status: 'failed' });
    log.error({ jobId: job?.id, error: err.message }, 'Job failed');
  });

  worker.on('error', (err) => {
    log.error({ error: err.message }, 'Worker error');
  });
}

/**
 * Start the housekeeping worker
 */
export function startHousekeepingWorker(
  tasks: HousekeepingTasks
): Worker<HousekeepingJobData, HousekeepingJobResult> {
  if (housekeepingWorker) {
    return housekeepingWorker;
  }

  housekeepingWorker = new Worker<HousekeepingJobData, HousekeepingJobResult>(
    QUEUE_NAMES.HOUSEKEEPING,
    (job) => processHousekeepingJob(job, tasks),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.HOUSEKEEPING,
    }
  );

  setupWorkerEvents(housekeepingWorker);
  log.info('Housekeeping worker started');

  return housekeepingWorker;
}

/**
 * Stop the housekeeping worker
 */
export async function stopHousekeepingWorker(): Promise<void> {
  if (housekeepingWorker) {
    await housekeepingWorker.close();
    housekeepingWorker = null;
    log.info('Housekeeping worker stopped');
  }
}

/**
 * Check if worker is running
 */
export function isHousekeepingWorkerRunning(): boolean {
  return housekeepingWorker !== null && !housekeepingWorker.closing;
}
