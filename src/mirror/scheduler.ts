/**
 * Periodic pass scheduler.
 * Runs a pass, waits the configured interval after it finishes, and repeats.
 * Failures are logged and the next pass retries from scratch.
 */
import type { MirrorEngine } from './engine.js';
import type { ErrorPolicy, PassResult } from './types.js';
import { MirrorLogger, nullSink } from './logger.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { MAX_INTERVAL_MS } from '../config.js';

export interface SchedulerOptions {
  /** Delay between the end of one pass and the start of the next */
  intervalMs: number;
  logger?: MirrorLogger;
  errorPolicy?: ErrorPolicy;
  /** Called after every pass */
  onPass?: (result: PassResult) => void;
  /** Called when a pass throws instead of returning a result */
  onError?: (error: Error) => void;
}

export interface Scheduler {
  /** Run the next pass as soon as possible (queued if a pass is running). */
  trigger(): void;
  /** Cancel the pending pass and abort a running one at its next directory. */
  stop(): void;
  readonly passCount: number;
  readonly stopped: boolean;
}

/**
 * Create and start a scheduler. The first pass runs on the next tick.
 * Throws ConfigurationError for an interval setTimeout cannot wait for.
 */
export function createScheduler(engine: MirrorEngine, options: SchedulerOptions): Scheduler {
  const { intervalMs, errorPolicy, onPass, onError } = options;
  if (!Number.isInteger(intervalMs) || intervalMs <= 0 || intervalMs > MAX_INTERVAL_MS) {
    throw new ConfigurationError(`Interval must be between 1 and ${MAX_INTERVAL_MS} ms (got ${intervalMs})`);
  }
  const logger = options.logger ?? new MirrorLogger(nullSink);
  const controller = new AbortController();

  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let rerun = false;
  let stopped = false;
  let passCount = 0;

  function schedule(delayMs: number): void {
    if (stopped) return;
    if (timer) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      runPass();
    }, delayMs);
  }

  function runPass(): void {
    if (stopped) return;
    if (running) {
      rerun = true; // Skip if previous pass still in progress, run again after it
      return;
    }
    running = true;

    try {
      const result = engine.runOnePass({ errorPolicy, signal: controller.signal });
      passCount++;
      onPass?.(result);
    } catch (err) {
      passCount++;
      logger.error('error', `Synchronization failed: ${errorMessage(err)}`);
      onError?.(err instanceof Error ? err : new Error(String(err)));
    } finally {
      running = false;
    }

    if (rerun) {
      rerun = false;
      schedule(0);
      return;
    }
    if (!stopped) {
      logger.info('schedule', `Sleeping for ${intervalMs / 1000} seconds`);
      schedule(intervalMs);
    }
  }

  schedule(0);

  return {
    trigger(): void {
      if (running) {
        rerun = true;
        return;
      }
      schedule(0);
    },
    stop(): void {
      stopped = true;
      controller.abort();
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    get passCount(): number {
      return passCount;
    },
    get stopped(): boolean {
      return stopped;
    },
  };
}
