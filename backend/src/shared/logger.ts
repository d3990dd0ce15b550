/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 *
 * Features:
 *   - Request/response serializers (method, url, status, duration)
 *   - Child loggers with request ID correlation
 *   - Express middleware for automatic request logging
 */
import pino from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

export const logger = pino({
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug'),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined, // JSON in production
  base: {
    service: 'newsdash-api',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = pino.Logger;

/** Request id assigned by requestLogger (or echoed from X-Request-Id). */
export function requestId(res: Response): string | undefined {
  const id: unknown = res.locals.reqId;
  return typeof id === 'string' ? id : undefined;
}

/**
 * Express middleware: logs every API request with duration and status.
 * Stores the request id and a child logger on res.locals.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const header = req.headers['x-request-id'];
    const reqId = typeof header === 'string' && header ? header : randomUUID().slice(0, 8);
    const log = logger.child({ reqId });

    res.locals.reqId = reqId;
    res.locals.log = log;
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      log[level]({
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      }, `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'ingestion', file });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
