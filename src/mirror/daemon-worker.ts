/**
 * Daemon worker process.
 * Runs as a detached background process, scheduling passes for every saved mirror.
 * Designed to be spawned by daemon.ts startDaemon().
 */
import { loadMirrors, updateLastRun } from './mirrors.js';
import { removePid } from './daemon.js';
import { buildMirrorConfig, parseInterval } from '../config.js';
import { createMirrorEngine } from './engine.js';
import { createScheduler, type Scheduler } from './scheduler.js';
import { MirrorLogger, createStreamSink, type LogSink } from './logger.js';
import { errorMessage } from './errors.js';

interface ManagedMirror {
  mirrorId: string;
  scheduler: Scheduler;
}

const managed: ManagedMirror[] = [];
const sink = createStreamSink(process.stdout);
const daemonLog = new MirrorLogger(sink);

function mirrorSink(mirrorId: string): LogSink {
  const tag = `[${mirrorId.slice(0, 8)}]`;
  return {
    write: (entry) => sink.write({ ...entry, message: `${tag} ${entry.message}` }),
  };
}

function start(): void {
  daemonLog.info('start', 'Daemon starting...');

  const mirrors = loadMirrors();
  if (mirrors.length === 0) {
    daemonLog.info('complete', 'No saved mirrors found. Daemon has nothing to do.');
    removePid();
    process.exit(0);
  }

  daemonLog.info('start', `Found ${mirrors.length} mirror(s)`);

  for (const mirror of mirrors) {
    try {
      const config = buildMirrorConfig({
        source: mirror.sourcePath,
        replica: mirror.replicaPath,
        algorithm: mirror.algorithm,
        ignore: mirror.ignore,
      });
      const logger = new MirrorLogger(mirrorSink(mirror.id));
      const engine = createMirrorEngine(config, { logger });
      const scheduler = createScheduler(engine, {
        intervalMs: parseInterval(mirror.interval),
        logger,
        onPass: (result) => {
          if (result.status === 'complete') updateLastRun(mirror.id);
        },
      });

      managed.push({ mirrorId: mirror.id, scheduler });
      daemonLog.info('schedule', `Started mirror ${mirror.id.slice(0, 8)}: ${config.sourcePath} -> ${config.replicaPath} every ${mirror.interval}`);
    } catch (err) {
      daemonLog.error('error', `Failed to start mirror ${mirror.id.slice(0, 8)}: ${errorMessage(err)}`);
    }
  }

  if (managed.length === 0) {
    daemonLog.error('abort', 'No mirrors could be started. Exiting.');
    removePid();
    process.exit(1);
  }

  daemonLog.info('schedule', `Daemon running with ${managed.length} mirror(s)`);
}

function shutdown(): void {
  daemonLog.info('complete', 'Daemon shutting down...');
  for (const mirror of managed) {
    mirror.scheduler.stop();
    daemonLog.info('complete', `Stopped mirror: ${mirror.mirrorId.slice(0, 8)}`);
  }
  removePid();
  daemonLog.info('complete', 'Daemon stopped.');
  process.exit(0);
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

// A failing pass must not take the daemon down; the next pass retries
process.on('uncaughtException', (err) => {
  daemonLog.error('error', `UNCAUGHT ERROR: ${err.message}`);
  daemonLog.error('error', err.stack ?? '');
});

process.on('unhandledRejection', (reason) => {
  daemonLog.error('error', `UNHANDLED REJECTION: ${errorMessage(reason)}`);
});

try {
  start();
} catch (err) {
  daemonLog.error('abort', `FATAL: ${errorMessage(err)}`);
  removePid();
  process.exit(1);
}
