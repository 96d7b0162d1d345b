import 'dotenv/config';
import http from 'http';
import { createApp } from './api/app';
import { OllamaBackendClient } from './clients/ollama-client';
import { InferenceRouter } from './load-balancer/inference-router';
import { loadConfig } from './utils/config-loader';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

const config = loadConfig();
logger.info('Configuration loaded', { config });

const adminApiKey = process.env.ADMIN_API_KEY;
if (!adminApiKey) {
  logger.warn('ADMIN_API_KEY not set - host management endpoints are unauthenticated');
}

const corsOrigins = process.env.CORS_ORIGIN
  ? process.env.CORS_ORIGIN.split(',').map(o => o.trim())
  : undefined;

const backend = new OllamaBackendClient();
const router = new InferenceRouter(config, { backend });
const app = createApp(router, {
  adminApiKey,
  corsOrigins,
  modelsCacheTtlMs: Number(process.env.CACHE_TTL_SECONDS || '30') * 1000
});

router.start();

const PORT = parseInt(process.env.PORT || '3000', 10);
const server: http.Server = app.listen(PORT, () => {
  logger.info(`Inference router listening on port ${PORT}`, {
    port: PORT,
    hosts: config.hosts.length,
    strategy: config.strategy,
    failover: config.failoverEnabled,
    nodeEnv: process.env.NODE_ENV || 'development'
  });
});

function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`, { signal });

  router.stop();
  server.close(error => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: describeError(error) });
    }
    backend.destroy();
    logger.info('Shutdown complete');
    process.exit(error ? 1 : 0);
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', { reason: describeError(reason) });
});

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
