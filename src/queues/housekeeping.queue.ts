/**
 * Housekeeping Queue
 *
 * Holds the repeatable jobs that expire stale reservations and fail CID
 * requests the key service never answered.
 */

import { Queue } from 'bullmq';

import { createServiceLogger } from '../observability/logger';

import { housekeepingJobOptions, QUEUE_NAMES, queueConnection } from './queue.config';

const log = createServiceLogger('housekeeping-queue');

export enum HousekeepingTask {
  EXPIRE_RESERVATIONS = 'expire-reservations',
  FAIL_STALE_CID_REQUESTS = 'fail-stale-cid-requests',
}

export interface HousekeepingJobData {
  task: HousekeepingTask;
}

export interface HousekeepingJobResult {
  task: HousekeepingTask;
  affected: number;
}

const RESERVATION_SWEEP_SCHEDULER = 'reservation-sweep';
const CID_REQUEST_SWEEP_SCHEDULER = 'cid-request-sweep';

let housekeepingQueue: Queue<HousekeepingJobData, HousekeepingJobResult> | null = null;

/**
 * Get or create the housekeeping queue
 */
export function getHousekeepingQueue(): Queue<HousekeepingJobData, HousekeepingJobResult> {
  if (!housekeepingQueue) {
    housekeepingQueue = new Queue<HousekeepingJobData, HousekeepingJobResult>(
      QUEUE_NAMES.HOUSEKEEPING,
      {
        connection: queueConnection,
        defaultJobOptions: housekeepingJobOptions,
      }
    );
    log.info('Housekeeping queue initialized');
  }
  return housekeepingQueue;
}

/**
 * Register (or move) the repeating reservation sweep
 */
export async function scheduleReservationSweep(everyMs: number): Promise<void> {
  const queue = getHousekeepingQueue();
  await queue.upsertJobScheduler(
    RESERVATION_SWEEP_SCHEDULER,
    { every: everyMs },
    {
      name: HousekeepingTask.EXPIRE_RESERVATIONS,
      data: { task: HousekeepingTask.EXPIRE_RESERVATIONS },
    }
  );
  log.info({ everyMs }, 'Reservation sweep scheduled');
}

export async function scheduleCidRequestSweep(everyMs: number): Promise<void> {
  const queue = getHousekeepingQueue();
  await queue.upsertJobScheduler(
    CID_REQUEST_SWEEP_SCHEDULER,
    { every: everyMs },
    {
      name: HousekeepingTask.FAIL_STALE_CID_REQUESTS,
      data: { task: HousekeepingTask.FAIL_STALE_CID_REQUESTS },
    }
  );
  log.info({ everyMs }, 'CID request sweep scheduled');
}

/**
 * Close the housekeeping queue connection
 */
export async function closeHousekeepingQueue(): Promise<void> {
  if (housekeepingQueue) {
    await housekeepingQueue.close();
    housekeepingQueue = null;
    log.info('Housekeeping queue closed');
  }
}

/**
 * Get queue statistics
 */
export async function getHousekeepingQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getHousekeepingQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
