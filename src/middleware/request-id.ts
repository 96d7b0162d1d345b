import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

/**
 * Request ID middleware - reuses the caller's X-Request-ID or generates one,
 * and exposes it as res.locals.requestId
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

export function getRequestId(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'unknown';
}
