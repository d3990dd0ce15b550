/**
 * app.ts — Express application wiring
 *
 * Middleware order: CORS → compression → JSON → metrics → request
 * logging → security headers → rate limit → routes → error handling.
 * Everything stateful (store, sessions, cache) is passed in, so tests
 * build the same app around an in-memory dataset.
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import { env } from './config/env.ts';
import { sentryErrorHandler } from './config/sentry.ts';
import { logger, requestId, requestLogger } from './shared/logger.ts';
import { metricsEndpoint, metricsMiddleware } from './shared/metrics.ts';
import { AppError, statusOf } from './shared/errors.ts';
import { rateLimit } from './shared/rate-limit.ts';
import { createDashboardRouter, type DashboardDeps } from './routes/dashboard.ts';
import { createHealthRouter } from './routes/health.ts';

export function createApp(deps: DashboardDeps) {
  const app = express();
  app.set('trust proxy', 1);

  const allowedOrigins = process.env.ALLOWED_ORIGINS
    ? process.env.ALLOWED_ORIGINS.split(',').map(s => s.trim())
    : ['*'];

  app.use(cors({ origin: allowedOrigins.includes('*') ? true : allowedOrigins }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '100kb' }));
  app.use(metricsMiddleware());
  app.use(requestLogger());

  // ─── Security headers ───
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (env.NODE_ENV === 'production') {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use('/api', rateLimit(env.RATE_LIMIT_MAX, env.RATE_LIMIT_WINDOW_MS));

  // ─── API Routes ───
  app.get('/api/metrics', metricsEndpoint);
  app.use('/api/health', createHealthRouter(deps));
  app.use('/api', createDashboardRouter(deps));

  app.use('/api', (_req, _res, next) => next(new AppError('Not found', 404)));

  // ─── Error handling: Sentry first, then structured response ───
  app.use(sentryErrorHandler());

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const reqId = requestId(res);
    if (status >= 500) {
      logger.error({ err, reqId, method: req.method, url: req.originalUrl }, `Unhandled error [${reqId}]`);
    }
    const message = err instanceof Error ? err.message : String(err);
    res.status(status).json({
      success: false,
      error: status >= 500 && env.NODE_ENV === 'production' ? 'Internal server error' : message,
      ...(err instanceof AppError && err.details ? { details: err.details } : {}),
      requestId: reqId,
    });
  });

  return app;
}
