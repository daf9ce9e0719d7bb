import { Request, Response, Router } from 'express';

/**
 * Dependency checks; each returns whether the dependency is usable now
 */
export interface HealthChecks {
  database: () => boolean;
  eventBus: () => boolean;
}

export const createHealthRoutes = (checks: HealthChecks): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const database = checks.database();
    const eventBus = checks.eventBus();
    const isHealthy = database && eventBus;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: { connected: database },
        eventBus: { connected: eventBus },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = checks.database() && checks.eventBus();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
