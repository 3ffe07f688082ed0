/**
 * Background daemon process management.
 * Manages starting, stopping, and checking the status of the mirror daemon.
 */
import fs from 'node:fs';
import path from 'node:path';
import { spawn } from 'node:child_process';
import { fileURLToPath } from 'node:url';
import { configDir } from '../config.js';
import { rotateLogIfNeeded } from './logger.js';

export interface DaemonStatus {
  running: boolean;
  pid: number | null;
  logFile: string;
  uptime: number | null;
  startedAt: string | null;
}

export function daemonDir(): string {
  return path.join(configDir(), 'daemon');
}

export function pidFile(): string {
  return path.join(daemonDir(), 'daemon.pid');
}

export function defaultLogFile(): string {
  return path.join(daemonDir(), 'daemon.log');
}

/**
 * Read the daemon PID from the PID file.
 */
export function readPid(): number | null {
  const file = pidFile();
  if (!fs.existsSync(file)) return null;
  const pid = parseInt(fs.readFileSync(file, 'utf-8').trim(), 10);
  return isNaN(pid) ? null : pid;
}

/**
 * Write the daemon PID to the PID file.
 */
export function writePid(pid: number): void {
  fs.mkdirSync(daemonDir(), { recursive: true });
  fs.writeFileSync(pidFile(), String(pid) + '\n');
}

/**
 * Remove the PID file.
 */
export function removePid(): void {
  fs.rmSync(pidFile(), { force: true });
}

/**
 * Check if a process with the given PID is running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 doesn't kill, just checks
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the current daemon status.
 * A PID file left behind by a dead process is removed.
 */
export function getDaemonStatus(): DaemonStatus {
  const pid = readPid();
  const running = pid !== null && isProcessRunning(pid);

  if (pid !== null && !running) {
    removePid();
  }

  let startedAt: string | null = null;
  let uptime: number | null = null;

  if (running) {
    const pidStat = fs.statSync(pidFile());
    startedAt = pidStat.mtime.toISOString();
    uptime = Math.floor((Date.now() - pidStat.mtimeMs) / 1000);
  }

  return {
    running,
    pid: running ? pid : null,
    logFile: defaultLogFile(),
    uptime,
    startedAt,
  };
}

/**
 * Start the daemon as a detached child process writing to logFile.
 * Returns the PID of the spawned process.
 */
export function startDaemon(logFile?: string): number {
  const status = getDaemonStatus();
  if (status.running) {
    throw new Error(`Daemon is already running (PID: ${status.pid})`);
  }

  fs.mkdirSync(daemonDir(), { recursive: true });
  const targetLog = logFile ?? defaultLogFile();
  rotateLogIfNeeded(targetLog);

  const logFd = fs.openSync(targetLog, 'a');
  const workerPath = fileURLToPath(new URL('./daemon-worker.js', import.meta.url));
  const child = spawn(process.execPath, [workerPath], {
    detached: true,
    stdio: ['ignore', logFd, logFd],
    env: { ...process.env, TREEMIRROR_DAEMON: '1' },
  });
  fs.closeSync(logFd);

  if (!child.pid) {
    throw new Error('Failed to spawn daemon process');
  }

  writePid(child.pid);
  child.unref();
  return child.pid;
}

/**
 * Stop the running daemon.
 * Returns false if no daemon was running.
 */
export function stopDaemon(): boolean {
  const pid = readPid();
  if (pid === null || !isProcessRunning(pid)) {
    removePid();
    return false;
  }

  try {
    process.kill(pid, 'SIGTERM');
    removePid();
    return true;
  } catch {
    // Exited between the liveness check and the signal
    removePid();
    return false;
  }
}
