// ═══════════════════════════════════════════════════════
// sessions.ts — One orchestrator per dashboard session
// In-memory only, capped; least recently used is evicted.
// ═══════════════════════════════════════════════════════
import { DashboardOrchestrator } from './orchestrator.ts';
import { childLogger } from '../shared/logger.ts';
import type { DatasetStore } from './dataset-store.ts';
import type { PipelineOptions } from '../types.ts';

const log = childLogger({ module: 'sessions' });

export class SessionRegistry {
  private readonly sessions = new Map<string, DashboardOrchestrator>();

  constructor(
    private readonly store: DatasetStore,
    private readonly opts: PipelineOptions,
    private readonly max: number,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /** Existing session, refreshed as most recently used. */
  find(id: string): DashboardOrchestrator | undefined {
    const orch = this.sessions.get(id);
    if (orch) {
      this.sessions.delete(id);
      this.sessions.set(id, orch);
    }
    return orch;
  }

  getOrCreate(id: string): DashboardOrchestrator {
    const existing = this.find(id);
    if (existing) return existing;

    if (this.sessions.size >= this.max) {
      const oldest = this.sessions.keys().next().value;
      if (oldest !== undefined) {
        this.sessions.delete(oldest);
        log.debug({ evicted: oldest }, 'Session evicted');
      }
    }

    const orch = new DashboardOrchestrator(this.store, this.opts, log.child({ session: id }));
    this.sessions.set(id, orch);
    return orch;
  }
}
