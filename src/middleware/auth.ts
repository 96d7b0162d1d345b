import { Request, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { constantTimeCompare } from '../utils/security';
import { getRequestId } from './request-id';

export const MIN_ADMIN_KEY_LENGTH = 16;

/**
 * The key a caller presented, from `Authorization: Bearer` or `X-API-Key`
 */
export function presentedApiKey(req: Pick<Request, 'headers'>): string | undefined {
  const bearer = /^Bearer\s+(.+)$/.exec(req.headers.authorization ?? '');
  if (bearer) {
    return bearer[1];
  }
  const header = req.headers['x-api-key'];
  return typeof header === 'string' && header.length > 0 ? header : undefined;
}

/**
 * Guard for the host management routes
 */
export function createAuthMiddleware(adminApiKey: string): RequestHandler {
  if (adminApiKey.length < MIN_ADMIN_KEY_LENGTH) {
    throw new Error(`Admin API key must be at least ${MIN_ADMIN_KEY_LENGTH} characters long`);
  }

  return (req, res, next) => {
    const presented = presentedApiKey(req);
    if (presented !== undefined && constantTimeCompare(presented, adminApiKey)) {
      next();
      return;
    }

    logger.warn('Rejected host management request', {
      method: req.method,
      path: req.path,
      keyPresented: presented !== undefined,
      requestId: getRequestId(res)
    });
    res.status(401).json({
      error: 'Unauthorized',
      message: 'Host management requires the admin API key',
      requestId: getRequestId(res)
    });
  };
}
