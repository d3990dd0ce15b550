/**
 * orchestrator.ts — Reactive core of one dashboard session
 *
 * States:
 *   idle        — showing the last published bundle (or none yet)
 *   recomputing — the most recent selection is being processed
 *
 * Each selection change builds criteria, filters the store once,
 * fans the subset out to every view and publishes the finished
 * bundle, frozen all the way down, in one assignment. A newer change supersedes any pass
 * still in flight: the older pass runs to completion but is
 * dropped instead of published. A rejected selection leaves the
 * published bundle untouched and does not supersede anything.
 */
import { buildCriteria } from './filter-builder.ts';
import { applyFilter } from './filter-engine.ts';
import { buildBundle } from './pipeline.ts';
import { deepFreeze } from './helpers.ts';
import { InvalidCriteriaError } from '../shared/errors.ts';
import { childLogger, type Logger } from '../shared/logger.ts';
import { orchestratorPasses, passDuration } from '../shared/metrics.ts';
import type { DatasetStore } from './dataset-store.ts';
import type { DashboardBundle, FilterCriteria, PipelineOptions, RawSelection } from '../types.ts';

export type OrchestratorState = 'idle' | 'recomputing';

export interface PublishedBundle {
  seq: number;
  bundle: DashboardBundle;
}

export type PassOutcome =
  | { status: 'published'; seq: number; bundle: DashboardBundle }
  | { status: 'superseded'; seq: number }
  | { status: 'rejected'; error: InvalidCriteriaError }
  | { status: 'failed'; seq: number; error: Error };

export type BundleListener = (published: PublishedBundle) => void;

export class DashboardOrchestrator {
  private latestSeq = 0;
  private pendingSeq: number | null = null;
  private published: PublishedBundle | null = null;
  private readonly listeners = new Set<BundleListener>();
  private readonly log: Logger;

  constructor(
    private readonly store: DatasetStore,
    private readonly opts: PipelineOptions,
    log?: Logger,
  ) {
    this.log = log ?? childLogger({ module: 'orchestrator' });
  }

  get state(): OrchestratorState {
    return this.pendingSeq === null ? 'idle' : 'recomputing';
  }

  current(): PublishedBundle | null {
    return this.published;
  }

  /** Listen for published bundles. Returns an unsubscribe function. */
  subscribe(listener: BundleListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  async update(raw: RawSelection): Promise<PassOutcome> {
    let criteria: FilterCriteria;
    try {
      criteria = buildCriteria(raw);
    } catch (err) {
      if (!(err instanceof InvalidCriteriaError)) throw err;
      orchestratorPasses.inc({ outcome: 'rejected' });
      this.log.debug({ details: err.details }, 'Selection rejected, keeping previous bundle');
      return { status: 'rejected', error: err };
    }

    const seq = ++this.latestSeq;
    this.pendingSeq = seq;
    const end = passDuration.startTimer({ mode: 'session' });

    try {
      const bundle = await buildBundle(applyFilter(this.store, criteria), this.opts);

      if (seq !== this.latestSeq) {
        end({ outcome: 'superseded' });
        orchestratorPasses.inc({ outcome: 'superseded' });
        return { status: 'superseded', seq };
      }

      this.published = deepFreeze({ seq, bundle });
      this.pendingSeq = null;
      end({ outcome: 'published' });
      orchestratorPasses.inc({ outcome: 'published' });
      this.notify(this.published);
      return { status: 'published', seq, bundle };
    } catch (err) {
      if (seq === this.latestSeq) this.pendingSeq = null;
      const error = err instanceof Error ? err : new Error(String(err));
      end({ outcome: 'failed' });
      orchestratorPasses.inc({ outcome: 'failed' });
      this.log.error({ err: error, seq }, 'Pipeline pass failed');
      return { status: 'failed', seq, error };
    }
  }

  private notify(published: PublishedBundle): void {
    for (const listener of this.listeners) {
      try {
        listener(published);
      } catch (err) {
        this.log.warn({ err, seq: published.seq }, 'Bundle listener threw');
      }
    }
  }
}
