import cors from 'cors';
import express, { Application } from 'express';
import helmet from 'helmet';

import { createAuthMiddleware } from './auth/auth.middleware';
import { config } from './config';
import { Container } from './container';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import {
  correlationMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
  metricsMiddleware,
} from './observability';
import { createHealthRoutes } from './routes/health';
import { AdminController, createAdminRoutes } from './services/admin';
import { CidController, createCidRoutes } from './services/cid';
import { DepositController, createDepositRoutes } from './services/deposit';
import { LedgerController, createLedgerRoutes } from './services/ledger';
import { PurchaseController, createPurchaseRoutes } from './services/purchase';
import { VoucherController, createVoucherRoutes } from './services/voucher';

export const createApp = (container: Container): Application => {
  const app = express();
  const authenticate = createAuthMiddleware(container.auth, container.ledger);

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(container.health));
  app.use('/ledger', createLedgerRoutes(new LedgerController(container.ledger), authenticate));
  app.use(
    '/packages',
    createPurchaseRoutes(
      new PurchaseController(container.catalog, container.purchases, container.reservations),
      authenticate
    )
  );
  app.use('/vouchers', createVoucherRoutes(new VoucherController(container.vouchers), authenticate));
  app.use('/deposits', createDepositRoutes(new DepositController(container.deposits), authenticate));
  app.use('/cid', createCidRoutes(new CidController(container.cid), authenticate));
  app.use(
    '/admin',
    createAdminRoutes(
      new AdminController(container.admin, container.vouchers, container.cid, container.reservations),
      authenticate
    )
  );

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'CID Ledger API',
      version: '1.0.0',
      description: 'Balance and ledger service for a CID activation-code bot',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
