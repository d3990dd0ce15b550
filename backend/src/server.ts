/**
 * server.ts — Process entry point
 *
 * Loads the dataset once, builds the app around it and listens.
 *   ENABLE_REDIS_CACHE=true → bundle cache in Redis (else in memory)
 *   SENTRY_DSN              → error tracking
 */
import 'dotenv/config';
import type { Server } from 'http';
import { env } from './config/env.ts';
import { getProfile } from './config/profiles.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { loadDataset } from './services/ingestion.ts';
import { getCache } from './services/cache-service.ts';
import { SessionRegistry } from './services/sessions.ts';
import { pipelineOptionsFromEnv } from './services/pipeline.ts';
import { createApp } from './app.ts';

const BOOT_TIME = Date.now();
let server: Server | null = null;

async function start(): Promise<void> {
  await initSentry();

  if (env.ENABLE_REDIS_CACHE) {
    const { getRedis } = await import('./config/redis.ts');
    try {
      await getRedis().connect();
    } catch (err) {
      logger.warn({ err }, 'Redis connect failed, cache calls will log and miss');
    }
  } else {
    logger.info('Redis disabled (ENABLE_REDIS_CACHE=false)');
  }

  const profile = getProfile(env.DATASET_PROFILE);
  const { store } = await loadDataset(env.DATA_FILE, profile, env.DATA_ENCODING);
  const opts = pipelineOptionsFromEnv();
  const sessions = new SessionRegistry(store, opts, env.SESSION_MAX);

  const app = createApp({ store, sessions, cache: getCache(), opts });
  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, rows: store.size, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });
}

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10_000).unref();

  if (server) server.close(() => logger.info('HTTP server closed'));

  try {
    await flushSentry(2000);
    if (env.ENABLE_REDIS_CACHE) {
      const { closeRedis } = await import('./config/redis.ts');
      await closeRedis();
    }
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});
