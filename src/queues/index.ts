/**
 * Queue Module Exports
 */

// Configuration
export {
  queueConnection,
  housekeepingJobOptions,
  QUEUE_NAMES,
  WORKER_CONCURRENCY,
} from './queue.config';

// Housekeeping Queue
export {
  HousekeepingTask,
  HousekeepingJobData,
  HousekeepingJobResult,
  getHousekeepingQueue,
  scheduleReservationSweep,
  scheduleCidRequestSweep,
  closeHousekeepingQueue,
  getHousekeepingQueueStats,
} from './housekeeping.queue';

// Workers
export {
  HousekeepingTasks,
  processHousekeepingJob,
  startHousekeepingWorker,
  stopHousekeepingWorker,
  isHousekeepingWorkerRunning,
} from './workers/housekeeping.worker';
