import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Normalize path to prevent high cardinality in metrics.
 * Telegram ids, voucher codes and generated ids become placeholders.
 */
const normalizePath = (path: string): string => {
  let normalized = path.replace(/\/(ltx|cid|rsv|adm)_[0-9a-f]+/gi, '/:id');

  normalized = normalized.replace(/\/\d+/g, '/:id');

  // Voucher codes under /admin/vouchers/:code
  normalized = normalized.replace(/(\/vouchers\/)(?!stats$|bulk$)[A-Z0-9_-]{6,20}$/i, '$1:code');

  return normalized;
};

/**
 * Get the route pattern from Express request
 * Falls back to normalized path if no route is available
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }

  return normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;

    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, durationSeconds);
  });

  next();
};
