import { createApp } from './app';
import { CidmsKeyIssuer } from './clients/cidms.client';
import { TronscanExplorer } from './clients/tronscan.client';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase, getDatabaseStatus } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createContainer } from './container';
import { eventBus } from './events/eventBus';
import { logger } from './observability';
import {
  closeHousekeepingQueue,
  scheduleCidRequestSweep,
  scheduleReservationSweep,
  startHousekeepingWorker,
  stopHousekeepingWorker,
} from './queues';
import { MongoLedgerStore } from './store/mongo/mongo.store';

const container = createContainer({
  store: new MongoLedgerStore(),
  publisher: eventBus,
  explorer: new TronscanExplorer({
    baseUrl: config.chain.explorerUrl,
    timeoutMs: config.chain.timeoutMs,
  }),
  keyIssuer: new CidmsKeyIssuer({
    url: config.keyService.url,
    apiKey: config.keyService.apiKey,
    timeoutMs: config.keyService.timeoutMs,
    userAgent: config.keyService.userAgent,
  }),
  health: {
    database: () => getDatabaseStatus().connected,
    eventBus: () => eventBus.getStatus().connected,
  },
});

const app = createApp(container);

const startServer = async (): Promise<void> => {
  try {
    logger.info(getEnvironmentInfo(), 'Starting CID ledger');

    await connectDatabase();
    await eventBus.connect();
    await connectRedis();

    startHousekeepingWorker({
      expireReservations: () => container.reservations.expireStale(),
      failStaleCidRequests: () => container.cid.failStale(),
    });
    await scheduleReservationSweep(config.reservation.sweepIntervalMs);
    await scheduleCidRequestSweep(config.keyService.timeoutMs);

    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, env: config.nodeEnv }, 'Server listening');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        const closeAll = async (): Promise<void> => {
          await stopHousekeepingWorker();
          await closeHousekeepingQueue();
          await eventBus.disconnect();
          await disconnectRedis();
          await disconnectDatabase();
        };

        closeAll()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
