import express, { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { ZodError } from 'zod';
import { InferenceRouter } from '../load-balancer/inference-router';
import { createAuthMiddleware } from '../middleware/auth';
import { getRequestId, requestIdMiddleware } from '../middleware/request-id';
import { withTtlCache } from '../utils/cached';
import {
  BackendCallError,
  ExhaustedRetriesError,
  InvalidHostError,
  NoHealthyHostError,
  describeError
} from '../utils/errors';
import { logger } from '../utils/logger';
import { register } from '../utils/prometheus';
import { generateRequestSchema, hostInputSchema, hostRemovalSchema } from '../utils/validation-schemas';

export interface AppOptions {
  /** When set, POST/DELETE /hosts require this key */
  adminApiKey?: string;
  corsOrigins?: string[];
  modelsCacheTtlMs?: number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

const passThrough: RequestHandler = (_req, _res, next) => next();

/**
 * HTTP front for an InferenceRouter. The router's lifecycle stays with
 * the caller.
 */
export function createApp(router: InferenceRouter, options: AppOptions = {}): Express {
  const app = express();
  const adminAuth = options.adminApiKey ? createAuthMiddleware(options.adminApiKey) : passThrough;
  const listModels = withTtlCache(() => router.listModels(), {
    ttlMs: options.modelsCacheTtlMs ?? 30000,
    keyPrefix: 'models'
  });

  app.use(helmet());
  if (options.corsOrigins && options.corsOrigins.length > 0) {
    app.use(cors({ origin: options.corsOrigins }));
  }
  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/hosts', asyncHandler(async (_req, res) => {
    const hosts = await router.hostStatus();
    res.json({
      strategy: router.strategy,
      total: hosts.length,
      healthy: hosts.filter(h => h.status === 'healthy').length,
      hosts
    });
  }));

  app.post('/hosts', adminAuth, (req: Request, res: Response) => {
    const { address } = hostInputSchema.parse(req.body);
    const added = router.addHost(address);
    listModels.clear();

    res.status(added ? 201 : 200).json({
      message: added ? 'Host added' : 'Host already registered',
      address,
      added
    });
  });

  app.delete('/hosts', adminAuth, (req: Request, res: Response) => {
    const { address } = hostRemovalSchema.parse(req.query);
    const removed = router.removeHost(address);

    if (removed === 0) {
      res.status(404).json({
        error: 'Not Found',
        message: `Host ${address} is not registered`
      });
      return;
    }

    listModels.clear();
    res.json({ message: 'Host removed', address, removed });
  });

  app.get('/models', asyncHandler(async (_req, res) => {
    res.json(await listModels());
  }));

  app.post('/generate', asyncHandler(async (req, res) => {
    const { prompt, model, params } = generateRequestSchema.parse(req.body);
    const response = await router.execute(prompt, { model, params });
    res.json(response);
  }));

  app.get('/metrics', asyncHandler(async (_req, res) => {
    res.set('Content-Type', register.contentType);
    res.send(await register.metrics());
  }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found', message: `No route for ${req.method} ${req.path}` });
  });

  app.use(errorHandler);

  return app;
}

function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const requestId = getRequestId(res);

  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ZodError) {
    logger.warn('Validation error', { errors: err.errors, path: req.path, requestId });
    res.status(400).json({
      error: 'Validation Error',
      message: err.errors.map(issue => issue.message).join('; '),
      requestId
    });
    return;
  }

  if (err instanceof InvalidHostError) {
    res.status(400).json({ error: 'Bad Request', message: err.message, code: err.code, requestId });
    return;
  }

  if (err instanceof NoHealthyHostError) {
    res.status(503).json({
      error: 'Service Unavailable',
      message: err.message,
      code: err.code,
      totalHosts: err.totalHosts,
      requestId
    });
    return;
  }

  if (err instanceof BackendCallError || err instanceof ExhaustedRetriesError) {
    logger.error('Backend request failed', { error: err.message, path: req.path, requestId });
    res.status(502).json({
      error: 'Bad Gateway',
      message: err.message,
      code: err.code,
      ...(err instanceof BackendCallError ? { host: err.address, attempt: err.attempt } : {}),
      requestId
    });
    return;
  }

  const status = httpStatusOf(err);
  if (status !== undefined && status < 500) {
    res.status(status).json({ error: 'Bad Request', message: describeError(err), requestId });
    return;
  }

  logger.error('Unhandled error', {
    error: describeError(err),
    stack: err instanceof Error ? err.stack : undefined,
    path: req.path,
    method: req.method,
    requestId
  });
  res.status(500).json({
    error: 'Internal Server Error',
    message: 'An unexpected error occurred',
    requestId
  });
}

// body-parser errors carry an HTTP status
function httpStatusOf(err: unknown): number | undefined {
  if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}
