import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { buildCriteria, isUnrestricted, snapshotCriteria } from '../services/filter-builder.ts';
import { applyFilter } from '../services/filter-engine.ts';
import { runPipeline } from '../services/pipeline.ts';
import { formatTable } from '../services/table-formatter.ts';
import { paginate } from '../services/helpers.ts';
import { dashboardKey, type CacheService } from '../services/cache-service.ts';
import { AppError, notFound } from '../shared/errors.ts';
import { passDuration } from '../shared/metrics.ts';
import { env } from '../config/env.ts';
import {
  ArticlesQuerySchema, DashboardQuerySchema, SelectionBodySchema,
  SessionParamSchema, toRawSelection,
} from '../schemas.ts';
import type { DatasetStore } from '../services/dataset-store.ts';
import type { SessionRegistry } from '../services/sessions.ts';
import type { PipelineOptions } from '../types.ts';

export interface DashboardDeps {
  store: DatasetStore;
  sessions: SessionRegistry;
  cache: CacheService;
  opts: PipelineOptions;
}

// ── Zod validation ──

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new AppError('Validation failed', 400, details);
  }
  return result.data;
}

export function createDashboardRouter({ store, sessions, cache, opts }: DashboardDeps) {
  const router = express.Router();
  let unfiltered: string | null = null;

  /**
   * GET /api/dashboard — every view for one selection
   * Bundles are cached per (dataset version, criteria); the unfiltered
   * one is kept in the router.
   */
  router.get('/dashboard', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const criteria = buildCriteria(toRawSelection(validate(DashboardQuerySchema, req.query)));
      const end = passDuration.startTimer({ mode: 'stateless' });
      let json: string | null;

      if (isUnrestricted(criteria)) {
        // the store never changes, so its unfiltered bundle is built once
        json = unfiltered;
        if (json) {
          end({ outcome: 'cached' });
        } else {
          json = JSON.stringify(await runPipeline(store, criteria, opts));
          unfiltered = json;
          end({ outcome: 'published' });
        }
      } else {
        const key = dashboardKey(store.version, snapshotCriteria(criteria));
        json = await cache.get(key);
        if (json) {
          end({ outcome: 'cached' });
        } else {
          json = JSON.stringify(await runPipeline(store, criteria, opts));
          end({ outcome: 'published' });
          await cache.set(key, json, env.CACHE_DASHBOARD_TTL);
        }
      }

      res.type('application/json').send(`{"success":true,"data":${json}}`);
    } catch (err) { next(err); }
  });

  /**
   * GET /api/filters — values for the selection widgets
   */
  router.get('/filters', (_req: Request, res: Response) => {
    res.json({ success: true, data: store.filterOptions() });
  });

  /**
   * GET /api/articles — one page of the detail table
   */
  router.get('/articles', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { page, limit, ...selection } = validate(ArticlesQuerySchema, req.query);
      const subset = applyFilter(store, buildCriteria(toRawSelection(selection)));
      res.json({ success: true, data: paginate(formatTable(subset.rows), page, limit) });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/sessions/:id/filters — selection change for one session
   * 200 with the published bundle, 202 when a newer change overtook it.
   */
  router.post('/sessions/:id/filters', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validate(SessionParamSchema, req.params);
      const selection = validate(SelectionBodySchema, req.body ?? {});
      const outcome = await sessions.getOrCreate(id).update(selection);

      switch (outcome.status) {
        case 'published':
          res.json({ success: true, data: { seq: outcome.seq, bundle: outcome.bundle } });
          return;
        case 'superseded':
          res.status(202).json({ success: true, superseded: true, seq: outcome.seq });
          return;
        case 'rejected':
        case 'failed':
          next(outcome.error);
          return;
      }
    } catch (err) { next(err); }
  });

  /**
   * GET /api/sessions/:id/bundle — last bundle published for a session
   */
  router.get('/sessions/:id/bundle', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = validate(SessionParamSchema, req.params);
      const published = sessions.find(id)?.current();
      if (!published) throw notFound('No bundle published for this session');
      res.json({ success: true, data: published });
    } catch (err) { next(err); }
  });

  return router;
}
