import { MemorySnapshotStore } from '../../src/adapters/storage/MemorySnapshotStore';
import { NodeTime } from '../../src/adapters/sys/NodeTime';
import { NodeTimerClock } from '../../src/adapters/sys/NodeTimerClock';
import { SimpleEventBus } from '../../src/adapters/sys/SimpleEventBus';
import { TimerRegistry } from '../../src/app/TimerRegistry';
import { HOUR_MS, MINUTE_MS } from '../../src/domain/timers/duration';
import type { TimerConfig } from '../../src/domain/timers/TimerEntity';
import { InvalidTransitionError, UnknownTimerError } from '../../src/domain/timers/TimerErrors';
import { TimerTopics } from '../../src/domain/timers/TimerEvents';
import type { TimerSnapshot } from '../../src/domain/timers/TimerSnapshot';
import type { LoggerPort } from '../../src/ports/sys/LoggerPort';

const NOW = Date.UTC(2024, 3, 2, 9, 0, 0);

function timer(id: string, overrides: Partial<TimerConfig> = {}): TimerConfig {
  return { id, duration: HOUR_MS, restore: true, restoreGracePeriod: 15 * MINUTE_MS, ...overrides };
}

function makeRegistry(seed: Record<string, TimerSnapshot> = {}) {
  const logger: jest.Mocked<LoggerPort> = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  const bus = new SimpleEventBus(logger);
  const clock = new NodeTimerClock();
  const store = new MemorySnapshotStore(seed);
  const finished: string[] = [];
  bus.subscribe<{ id: string }>(TimerTopics.Finished, (event) => finished.push(event.id));
  const registry = new TimerRegistry({ bus, clock, time: new NodeTime(), store, logger });
  return { registry, clock, store, logger, finished };
}

describe('TimerRegistry', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(NOW);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('load creates idle timers when there is nothing to restore', async () => {
    const { registry } = makeRegistry();
    const report = await registry.load([timer('tea'), timer('oven')]);

    expect(report).toEqual({ loaded: ['tea', 'oven'], failed: [], restored: {} });
    expect(registry.list().map((t) => [t.id, t.state])).toEqual([
      ['tea', 'idle'],
      ['oven', 'idle'],
    ]);
  });

  test('load restores each timer from its snapshot', async () => {
    const { registry, clock, finished } = makeRegistry({
      running: { state: 'active', duration: HOUR_MS, endAt: NOW + 10 * MINUTE_MS },
      late: { state: 'active', duration: HOUR_MS, endAt: NOW - 5 * MINUTE_MS },
      stale: { state: 'active', duration: HOUR_MS, endAt: NOW - 3 * HOUR_MS },
      held: { state: 'paused', duration: HOUR_MS, remaining: 7 * MINUTE_MS },
    });

    const report = await registry.load([timer('running'), timer('late'), timer('stale'), timer('held'), timer('fresh')]);

    expect(report.restored).toEqual({ running: 'resumed', late: 'finished', stale: 'missed', held: 'paused' });
    expect(registry.get('running').state).toBe('active');
    expect(registry.get('held').remaining).toBe(7 * MINUTE_MS);
    expect(registry.get('fresh').state).toBe('idle');
    expect(finished).toEqual(['late']);
    expect(clock.pending()).toBe(1);
  });

  test('restore-disabled timers ignore their snapshot', async () => {
    const { registry } = makeRegistry({
      tea: { state: 'paused', duration: HOUR_MS, remaining: MINUTE_MS },
    });
    const report = await registry.load([timer('tea', { restore: false })]);

    expect(report.restored).toEqual({});
    expect(registry.get('tea').state).toBe('idle');
  });

  test('a failing timer does not block the others', async () => {
    const { registry, logger } = makeRegistry();
    const report = await registry.load([timer('bad', { restoreGracePeriod: -1 }), timer('good'), timer('good')]);

    expect(report.loaded).toEqual(['good']);
    expect(report.failed).toEqual(['bad', 'good']);
    expect(logger.error).toHaveBeenCalledWith('Failed to set up timer', {
      id: 'bad',
      error: 'Timer bad is misconfigured: restore grace period must not be negative.',
    });
  });

  test('get throws for unknown ids', async () => {
    const { registry } = makeRegistry();
    await registry.load([timer('tea')]);

    expect(registry.has('tea')).toBe(true);
    expect(registry.has('coffee')).toBe(false);
    expect(() => registry.get('coffee')).toThrow(UnknownTimerError);
  });

  test('execute dispatches commands to the entity', async () => {
    const { registry, finished } = makeRegistry();
    await registry.load([timer('tea')]);

    expect(registry.execute({ type: 'start', id: 'tea', duration: 3 * MINUTE_MS }).endAt).toBe(NOW + 3 * MINUTE_MS);
    jest.advanceTimersByTime(MINUTE_MS);
    expect(registry.execute({ type: 'pause', id: 'tea' }).remaining).toBe(2 * MINUTE_MS);
    registry.execute({ type: 'start', id: 'tea' });
    registry.execute({ type: 'change_duration', id: 'tea', duration: 30_000 });
    expect(registry.get('tea').endAt).toBe(NOW + MINUTE_MS + 30_000);
    registry.execute({ type: 'cancel', id: 'tea' });
    expect(() => registry.execute({ type: 'cancel', id: 'tea' })).toThrow(InvalidTransitionError);
    registry.execute({ type: 'start', id: 'tea' });
    registry.execute({ type: 'finish', id: 'tea' });

    expect(finished).toEqual(['tea']);
    expect(() => registry.execute({ type: 'pause', id: 'nope' })).toThrow(UnknownTimerError);
  });

  test('persist writes snapshots for restore-enabled timers only', async () => {
    const { registry, store } = makeRegistry();
    await registry.load([timer('tea'), timer('light', { restore: false })]);
    registry.execute({ type: 'start', id: 'tea' });
    registry.execute({ type: 'start', id: 'light' });

    await registry.persist();

    expect(await store.get('tea')).toEqual({ state: 'active', duration: HOUR_MS, endAt: NOW + HOUR_MS });
    expect(await store.get('light')).toBeNull();
  });

  test('persist logs store failures and continues', async () => {
    const { registry, store, logger } = makeRegistry();
    await registry.load([timer('a'), timer('b')]);
    const put = jest.spyOn(store, 'put').mockRejectedValueOnce(new Error('disk full'));

    await registry.persist();

    expect(put).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith('Failed to persist timer snapshot', { id: 'a', error: 'disk full' });
    expect(await store.get('b')).toEqual({ state: 'idle', duration: HOUR_MS });
  });

  test('autosave persists on an interval until stopped', async () => {
    const { registry, store } = makeRegistry();
    await registry.load([timer('tea')]);
    const put = jest.spyOn(store, 'put');

    registry.startAutosave(1_000);
    await jest.advanceTimersByTimeAsync(1_000);
    expect(put).toHaveBeenCalledTimes(1);

    registry.stopAutosave();
    await jest.advanceTimersByTimeAsync(5_000);
    expect(put).toHaveBeenCalledTimes(1);
  });

  test('reload adds, reconfigures and removes timers', async () => {
    const { registry, clock, logger } = makeRegistry();
    await registry.load([timer('tea'), timer('oven')]);
    registry.execute({ type: 'start', id: 'oven' });

    const report = await registry.reload([
      timer('tea', { name: 'Green tea', duration: 2 * MINUTE_MS, restoreGracePeriod: 0 }),
      timer('coffee'),
    ]);

    expect(report.loaded).toEqual(['coffee']);
    expect(registry.list().map((t) => t.id)).toEqual(['tea', 'coffee']);
    expect(registry.get('tea').displayName).toBe('Green tea');
    expect(registry.get('tea').duration).toBe(2 * MINUTE_MS);
    expect(registry.get('tea').gracePeriod).toBe(15 * MINUTE_MS);
    expect(logger.warn).toHaveBeenCalledWith('Restore settings only apply at creation; keeping the current ones', {
      id: 'tea',
    });
    expect(clock.pending()).toBe(0);
  });

  test('a timer removed by reload comes back idle when configured again', async () => {
    const { registry, store, finished } = makeRegistry();
    await registry.load([timer('tea')]);
    registry.execute({ type: 'start', id: 'tea' });
    await registry.persist();

    await registry.reload([]);
    expect(await store.get('tea')).toBeNull();

    jest.advanceTimersByTime(10 * MINUTE_MS);
    const report = await registry.reload([timer('tea')]);

    expect(report).toEqual({ loaded: ['tea'], failed: [], restored: {} });
    expect(registry.get('tea').state).toBe('idle');

    jest.advanceTimersByTime(50 * MINUTE_MS);
    expect(finished).toEqual([]);
  });

  test('reload logs a snapshot that cannot be removed and still drops the timer', async () => {
    const { registry, store, logger } = makeRegistry();
    await registry.load([timer('tea'), timer('oven')]);
    jest.spyOn(store, 'remove').mockRejectedValueOnce(new Error('read-only'));

    await registry.reload([timer('oven')]);

    expect(registry.has('tea')).toBe(false);
    expect(logger.error).toHaveBeenCalledWith('Failed to remove timer snapshot', { id: 'tea', error: 'read-only' });
  });

  test('shutdown persists, disarms every alarm and empties the registry', async () => {
    const { registry, clock, store, finished } = makeRegistry();
    await registry.load([timer('tea')]);
    registry.execute({ type: 'start', id: 'tea' });
    registry.startAutosave(1_000);

    await registry.shutdown();

    expect(clock.pending()).toBe(0);
    expect(registry.list()).toEqual([]);
    expect(await store.get('tea')).toEqual({ state: 'active', duration: HOUR_MS, endAt: NOW + HOUR_MS });

    jest.advanceTimersByTime(2 * HOUR_MS);
    expect(finished).toEqual([]);
  });
});
