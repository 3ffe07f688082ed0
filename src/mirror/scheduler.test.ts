import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createScheduler, type Scheduler } from './scheduler.js';
import { MirrorLogger, type LogEntry } from './logger.js';
import { createFingerprinter } from './fingerprint.js';
import { emptyPlan } from './plan.js';
import { ConfigurationError } from './errors.js';
import type { MirrorEngine } from './engine.js';
import type { PassResult, RunPassOptions } from './types.js';

function makeResult(overrides: Partial<PassResult> = {}): PassResult {
  return {
    status: 'complete',
    counts: { created: 0, updated: 0, deleted: 0, unchanged: 0, bytesCopied: 0 },
    errors: [],
    plan: emptyPlan(),
    dryRun: false,
    startedAt: '2025-01-01T00:00:00.000Z',
    durationMs: 0,
    ...overrides,
  };
}

describe('pass scheduler', () => {
  let entries: LogEntry[];
  let logger: MirrorLogger;
  let scheduler: Scheduler | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    entries = [];
    logger = new MirrorLogger({ write: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    scheduler?.stop();
    scheduler = undefined;
    vi.useRealTimers();
  });

  function makeEngine(run: (options?: RunPassOptions) => PassResult = () => makeResult()) {
    const runOnePass = vi.fn(run);
    const engine: MirrorEngine = {
      config: { sourcePath: '/data/source', replicaPath: '/data/replica', algorithm: 'md5', ignore: [] },
      fingerprinter: createFingerprinter('md5'),
      runOnePass,
      plan: () => emptyPlan(),
    };
    return { engine, runOnePass };
  }

  it('should run the first pass on the next tick', () => {
    const { engine, runOnePass } = makeEngine();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger });

    expect(runOnePass).not.toHaveBeenCalled();
    vi.advanceTimersByTime(0);
    expect(runOnePass).toHaveBeenCalledTimes(1);
    expect(scheduler.passCount).toBe(1);
  });

  it('should refuse an interval outside the timer range', () => {
    const { engine, runOnePass } = makeEngine();

    expect(() => createScheduler(engine, { intervalMs: 3_600_000_000, logger })).toThrow(
      'Interval must be between 1 and 2147483647 ms (got 3600000000)',
    );
    expect(() => createScheduler(engine, { intervalMs: 0, logger })).toThrow(ConfigurationError);
    vi.advanceTimersByTime(50);
    expect(runOnePass).not.toHaveBeenCalled();
  });

  it('should wait the interval after each pass', () => {
    const { engine, runOnePass } = makeEngine();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger });

    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(999);
    expect(runOnePass).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(runOnePass).toHaveBeenCalledTimes(2);
    expect(entries.filter(e => e.event === 'schedule').map(e => e.message)).toEqual([
      'Sleeping for 1 seconds',
      'Sleeping for 1 seconds',
    ]);
  });

  it('should pass the error policy and an abort signal to the engine', () => {
    const { engine, runOnePass } = makeEngine();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger, errorPolicy: 'continue' });

    vi.advanceTimersByTime(0);
    const options = runOnePass.mock.calls[0][0];
    expect(options?.errorPolicy).toBe('continue');
    expect(options?.signal?.aborted).toBe(false);

    scheduler.stop();
    expect(options?.signal?.aborted).toBe(true);
  });

  it('should report each pass result', () => {
    const result = makeResult({ status: 'aborted' });
    const { engine } = makeEngine(() => result);
    const onPass = vi.fn();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger, onPass });

    vi.advanceTimersByTime(0);
    expect(onPass).toHaveBeenCalledWith(result);
  });

  it('should log a throwing pass and keep scheduling', () => {
    const { engine, runOnePass } = makeEngine(() => {
      throw new Error('boom');
    });
    const onError = vi.fn();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger, onError });

    vi.advanceTimersByTime(0);
    expect(onError).toHaveBeenCalledWith(new Error('boom'));
    expect(entries[0]).toMatchObject({ level: 'error', message: 'Synchronization failed: boom' });

    vi.advanceTimersByTime(1000);
    expect(runOnePass).toHaveBeenCalledTimes(2);
    expect(scheduler.passCount).toBe(2);
  });

  it('should stop running passes once stopped', () => {
    const { engine, runOnePass } = makeEngine();
    scheduler = createScheduler(engine, { intervalMs: 1000, logger });

    vi.advanceTimersByTime(0);
    scheduler.stop();
    vi.advanceTimersByTime(10_000);

    expect(runOnePass).toHaveBeenCalledTimes(1);
    expect(scheduler.stopped).toBe(true);
  });

  it('should not sleep after a pass that stopped the scheduler', () => {
    const { engine } = makeEngine();
    scheduler = createScheduler(engine, {
      intervalMs: 1000,
      logger,
      onPass: () => scheduler?.stop(),
    });

    vi.advanceTimersByTime(0);
    expect(entries.filter(e => e.event === 'schedule')).toEqual([]);
  });

  it('should run a pass right away when triggered', () => {
    const { engine, runOnePass } = makeEngine();
    scheduler = createScheduler(engine, { intervalMs: 60_000, logger });

    vi.advanceTimersByTime(0);
    scheduler.trigger();
    vi.advanceTimersByTime(0);

    expect(runOnePass).toHaveBeenCalledTimes(2);
  });

  it('should rerun once when triggered during a pass', () => {
    let calls = 0;
    const { engine, runOnePass } = makeEngine(() => {
      calls++;
      if (calls === 1) scheduler?.trigger();
      return makeResult();
    });
    scheduler = createScheduler(engine, { intervalMs: 60_000, logger });

    vi.advanceTimersByTime(0);
    expect(runOnePass).toHaveBeenCalledTimes(1);
    // Timers queued while a timer callback runs fire one tick later
    vi.advanceTimersByTime(1);
    expect(runOnePass).toHaveBeenCalledTimes(2);
    expect(entries.filter(e => e.event === 'schedule')).toHaveLength(1);
  });
});
