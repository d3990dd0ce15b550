/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   newsdash_http_requests_total            — Counter by method/route/status
 *   newsdash_http_request_duration_seconds  — Histogram by method/route/status
 *   newsdash_pipeline_pass_duration_seconds — Histogram by mode/outcome
 *   newsdash_orchestrator_passes_total      — Counter by outcome
 *   newsdash_cache_operations_total         — Counter by operation
 *   newsdash_dataset_rows                   — Gauge for the loaded store
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

// Node.js runtime metrics (event loop lag, GC, memory, etc.)
collectDefaultMetrics({ register: registry, prefix: 'newsdash_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'newsdash_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'newsdash_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

// ── Pipeline Metrics ──

export const passDuration = new Histogram({
  name: 'newsdash_pipeline_pass_duration_seconds',
  help: 'Filter/aggregate pass duration in seconds',
  labelNames: ['mode', 'outcome'] as const, // stateless|session × published|superseded|cached|failed
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

export const orchestratorPasses = new Counter({
  name: 'newsdash_orchestrator_passes_total',
  help: 'Orchestrator passes by outcome',
  labelNames: ['outcome'] as const, // published, superseded, rejected, failed
  registers: [registry],
});

// ── Cache Metrics ──

export const cacheOperations = new Counter({
  name: 'newsdash_cache_operations_total',
  help: 'Cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, set
  registers: [registry],
});

// ── Dataset Metrics ──

export const datasetRows = new Gauge({
  name: 'newsdash_dataset_rows',
  help: 'Rows in the loaded dataset store',
  labelNames: ['profile'] as const,
  registers: [registry],
});

// ── Express Middleware ──

/**
 * Normalize route for metric labels.
 * Collapses path params: /api/sessions/abc/filters → /api/sessions/:id/filters
 */
function normalizeRoute(req: Request): string {
  const url = req.originalUrl || req.url;
  return (url.split('?')[0] ?? url)
    .replace(/\/api\/sessions\/[^/]+/, '/api/sessions/:id');
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    if (req.url === '/api/metrics') return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch (err) {
    res.status(500).end(`Error collecting metrics: ${err instanceof Error ? err.message : String(err)}`);
  }
}
