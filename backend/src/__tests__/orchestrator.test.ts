import { describe, it, expect, vi } from 'vitest';
import { DashboardOrchestrator, type PublishedBundle } from '../services/orchestrator.ts';
import { SessionRegistry } from '../services/sessions.ts';
import { InvalidCriteriaError } from '../shared/errors.ts';
import { OPTS, newsStore, scenarioStore } from './fixtures.ts';

describe('DashboardOrchestrator', () => {
  it('starts idle with nothing published', () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    expect(orch.state).toBe('idle');
    expect(orch.current()).toBeNull();
  });

  it('is recomputing while a pass runs and idle once it publishes', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const pass = orch.update({ categories: ['flood'] });
    expect(orch.state).toBe('recomputing');

    const outcome = await pass;
    expect(outcome.status).toBe('published');
    expect(orch.state).toBe('idle');
    expect(orch.current()?.seq).toBe(1);
    expect(orch.current()?.bundle.categoryCounts).toEqual({ flood: 2 });
  });

  it('publishes only the latest of two overlapping selections', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const listener = vi.fn<(p: PublishedBundle) => void>();
    orch.subscribe(listener);

    const first = orch.update({ categories: ['flood'] });
    const second = orch.update({ categories: ['fire'] });
    const [a, b] = await Promise.all([first, second]);

    expect(a).toEqual({ status: 'superseded', seq: 1 });
    expect(b.status).toBe('published');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0].seq).toBe(2);
    expect(orch.current()?.bundle.categoryCounts).toEqual({ fire: 1 });
    expect(orch.state).toBe('idle');
  });

  it('keeps the last good bundle when a selection is rejected', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    await orch.update({ categories: ['flood'] });
    const before = orch.current();

    const outcome = await orch.update({ dateFrom: '2024-01-05', dateTo: '2024-01-01' });
    expect(outcome.status).toBe('rejected');
    if (outcome.status === 'rejected') expect(outcome.error).toBeInstanceOf(InvalidCriteriaError);
    expect(orch.current()).toBe(before);
    expect(orch.state).toBe('idle');
  });

  it('does not let a rejected selection supersede a pass in flight', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const pass = orch.update({ categories: ['fire'] });
    const rejected = await orch.update({ dateFrom: 'not-a-date' });

    expect(rejected.status).toBe('rejected');
    expect((await pass).status).toBe('published');
    expect(orch.current()?.bundle.categoryCounts).toEqual({ fire: 1 });
  });

  it('freezes what it publishes, views included', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const outcome = await orch.update({});
    const published = orch.current();
    expect(Object.isFrozen(published)).toBe(true);
    expect(Object.isFrozen(published?.bundle)).toBe(true);
    expect(Object.isFrozen(published?.bundle.table)).toBe(true);
    expect(Object.isFrozen(published?.bundle.table[0])).toBe(true);
    expect(Object.isFrozen(published?.bundle.topLocations)).toBe(true);
    expect(Object.isFrozen(published?.bundle.categoryCounts)).toBe(true);
    expect(Object.isFrozen(published?.bundle.criteria.categories)).toBe(true);

    if (outcome.status !== 'published') throw new Error(`expected a published pass, got ${outcome.status}`);
    expect(outcome.bundle).toBe(published?.bundle);
    expect(() => { outcome.bundle.topLocations.push({ key: 'Z', count: 9 }); }).toThrow(TypeError);
  });

  it('reaches the same bundle for the same selection', async () => {
    const orch = new DashboardOrchestrator(newsStore(), OPTS);
    await orch.update({ locationUnits: ['Hillview'] });
    const first = JSON.stringify(orch.current()?.bundle);
    await orch.update({ categories: ['storm'] });
    await orch.update({ locationUnits: ['Hillview'] });
    expect(JSON.stringify(orch.current()?.bundle)).toBe(first);
    expect(orch.current()?.seq).toBe(3);
  });

  it('keeps notifying when one listener throws', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const good = vi.fn();
    orch.subscribe(() => { throw new Error('listener boom'); });
    orch.subscribe(good);

    const outcome = await orch.update({});
    expect(outcome.status).toBe('published');
    expect(good).toHaveBeenCalledTimes(1);
  });

  it('stops notifying after unsubscribe', async () => {
    const orch = new DashboardOrchestrator(scenarioStore(), OPTS);
    const listener = vi.fn();
    const off = orch.subscribe(listener);
    await orch.update({});
    off();
    await orch.update({ categories: ['fire'] });
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('SessionRegistry', () => {
  it('returns the same orchestrator for the same id', () => {
    const sessions = new SessionRegistry(scenarioStore(), OPTS, 5);
    expect(sessions.getOrCreate('a')).toBe(sessions.getOrCreate('a'));
    expect(sessions.find('b')).toBeUndefined();
    expect(sessions.size).toBe(1);
  });

  it('evicts the least recently used session at capacity', () => {
    const sessions = new SessionRegistry(scenarioStore(), OPTS, 2);
    const a = sessions.getOrCreate('a');
    sessions.getOrCreate('b');
    sessions.find('a');
    sessions.getOrCreate('c');

    expect(sessions.size).toBe(2);
    expect(sessions.find('b')).toBeUndefined();
    expect(sessions.find('a')).toBe(a);
  });
});
