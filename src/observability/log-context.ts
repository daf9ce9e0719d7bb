import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields mixed into every log line.
 * `userId` is the Telegram id, set once the bearer token is verified.
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  admin?: boolean;
  idempotencyKey?: string;
}

const storage = new AsyncLocalStorage<LogContext>();

export const withLogContext = <T>(context: LogContext, fn: () => T): T =>
  storage.run(context, fn);

export const getLogContext = (): LogContext | undefined => storage.getStore();

export const getCorrelationId = (): string | undefined => storage.getStore()?.correlationId;

/**
 * Enrich the active request context. Outside a request (queue jobs,
 * startup) there is nothing to enrich and the call does nothing.
 */
export const addLogContext = (fields: Omit<LogContext, 'correlationId'>): void => {
  const context = storage.getStore();
  if (context) {
    Object.assign(context, fields);
  }
};
