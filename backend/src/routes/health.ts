/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: dataset, cache, Redis, memory
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import type { CacheService } from '../services/cache-service.ts';
import type { DatasetStore } from '../services/dataset-store.ts';
import type { SessionRegistry } from '../services/sessions.ts';

interface Check {
  status: 'ok' | 'error' | 'disabled';
  latencyMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

export function createHealthRouter(deps: { store: DatasetStore; cache: CacheService; sessions: SessionRegistry }) {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const checks: Record<string, Check> = {};

    checks.dataset = deps.store.size > 0
      ? { status: 'ok', details: { rows: deps.store.size, version: deps.store.version, profile: deps.store.profile.id } }
      : { status: 'error', error: 'Dataset is empty' };

    if (env.ENABLE_REDIS_CACHE) {
      try {
        const { pingRedis } = await import('../config/redis.ts');
        checks.redis = { status: 'ok', latencyMs: await pingRedis() };
      } catch (err) {
        checks.redis = { status: 'error', error: err instanceof Error ? err.message : String(err) };
      }
    } else {
      checks.redis = { status: 'disabled' };
    }

    checks.cache = { status: 'ok', details: await deps.cache.getStats() };
    checks.sessions = { status: 'ok', details: { active: deps.sessions.size } };

    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const hasError = Object.values(checks).some(c => c.status === 'error');
    res.status(hasError ? 503 : 200).json({
      status: hasError ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
    });
  });

  return router;
}
