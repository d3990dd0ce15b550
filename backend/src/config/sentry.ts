/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops.
 */
import type { ErrorRequestHandler } from 'express';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';
import { statusOf } from '../shared/errors.ts';

type SentryModule = typeof import('@sentry/node');

const log = childLogger({ module: 'sentry' });
let sentry: SentryModule | null = null;

/**
 * Initialize Sentry. Call once at server startup.
 * No-op if SENTRY_DSN is not set.
 */
export async function initSentry(): Promise<void> {
  if (!env.SENTRY_DSN) {
    log.info('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  const mod = await import('@sentry/node');
  mod.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version || 'unknown',
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
      }
      return event;
    },
  });

  sentry = mod;
  log.info('Sentry initialized');
}

/**
 * Capture an exception manually.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  if (!sentry) return;
  sentry.captureException(err, context ? { extra: context } : undefined);
}

/**
 * Express error middleware: reports server errors, then hands off.
 * Client errors (4xx) are expected traffic and are not reported.
 */
export function sentryErrorHandler(): ErrorRequestHandler {
  return (err, req, _res, next) => {
    if (statusOf(err) >= 500) captureException(err, { url: req.originalUrl, method: req.method });
    next(err);
  };
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!sentry) return;
  await sentry.flush(timeout);
}
