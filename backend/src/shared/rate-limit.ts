/**
 * shared/rate-limit.ts — Fixed-window rate limiting per client, in memory
 *
 * Once per window every expired client entry is dropped, so the map
 * only holds clients seen during the current window.
 */
import type { Request, Response, NextFunction } from 'express';

export interface WindowHit {
  count: number;
  resetAt: number;   // epoch ms when this client's window ends
}

export class FixedWindowCounter {
  private readonly hits = new Map<string, { n: number; since: number }>();
  private lastSweep = 0;

  constructor(private readonly windowMs: number) {}

  /** Clients currently tracked. */
  get size(): number {
    return this.hits.size;
  }

  hit(key: string, now: number): WindowHit {
    if (now - this.lastSweep >= this.windowMs) this.sweep(now);

    let entry = this.hits.get(key);
    if (!entry || now - entry.since >= this.windowMs) {
      entry = { n: 0, since: now };
      this.hits.set(key, entry);
    }
    entry.n++;
    return { count: entry.n, resetAt: entry.since + this.windowMs };
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.hits) {
      if (now - entry.since >= this.windowMs) this.hits.delete(key);
    }
    this.lastSweep = now;
  }
}

export function rateLimit(max: number, windowMs: number) {
  const counter = new FixedWindowCounter(windowMs);
  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const { count, resetAt } = counter.hit(ip, now);
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - count)));
    if (count > max) {
      res.status(429).json({ success: false, error: 'Rate limited', retryAfter: Math.ceil((resetAt - now) / 1000) });
      return;
    }
    next();
  };
}
