import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { FixedWindowCounter, rateLimit } from '../shared/rate-limit.ts';

describe('FixedWindowCounter', () => {
  it('counts hits within a window and starts over after it', () => {
    const counter = new FixedWindowCounter(1000);
    expect(counter.hit('a', 0)).toEqual({ count: 1, resetAt: 1000 });
    expect(counter.hit('a', 999)).toEqual({ count: 2, resetAt: 1000 });
    expect(counter.hit('a', 1000)).toEqual({ count: 1, resetAt: 2000 });
  });

  it('drops clients whose window has expired', () => {
    const counter = new FixedWindowCounter(1000);
    counter.hit('a', 0);
    counter.hit('b', 500);
    expect(counter.size).toBe(2);

    // a's window ended at 1000, b's is still open
    counter.hit('c', 1200);
    expect(counter.size).toBe(2);

    // neither b nor c has been seen within the last window
    counter.hit('d', 2300);
    expect(counter.size).toBe(1);
  });
});

describe('rateLimit', () => {
  it('answers 429 once the limit is spent', async () => {
    const app = express();
    app.use(rateLimit(2, 60_000));
    app.get('/ping', (_req, res) => { res.json({ success: true }); });

    expect((await request(app).get('/ping')).headers['x-ratelimit-remaining']).toBe('1');
    expect((await request(app).get('/ping')).status).toBe(200);
    const limited = await request(app).get('/ping');
    expect(limited.status).toBe(429);
    expect(limited.body).toMatchObject({ success: false, error: 'Rate limited', retryAfter: 60 });
  });
});
