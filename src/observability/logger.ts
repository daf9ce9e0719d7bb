import pino from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: Disabled for cleaner test output
 *
 * Every line carries the request-scoped context (correlation id, user id)
 * when one is active.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'cid-ledger',
    env: config.nodeEnv,
  },
  mixin: () => ({ ...getLogContext() }),
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for component-specific logging
export const createServiceLogger = (serviceName: string) => {
  return logger.child({ component: serviceName });
};
