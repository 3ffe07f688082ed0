/**
 * Log sinks for mirror events.
 * The engine emits semantic events; sinks decide on format and destination.
 * Sinks are constructed by the caller and passed in: there is no global logger.
 */
import fs from 'node:fs';
import path from 'node:path';
import type { Output } from '../utils/output.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type MirrorEvent =
  | 'start'
  | 'create'
  | 'update'
  | 'delete'
  | 'complete'
  | 'error'
  | 'abort'
  | 'schedule';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  event: MirrorEvent;
  message: string;
  /** Filesystem path the event is about, if any */
  path?: string;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
export const MAX_LOG_AGE_DAYS = 7;

/**
 * Logger handed to the engine and scheduler.
 */
export class MirrorLogger {
  private sink: LogSink;
  private now: () => Date;

  constructor(sink: LogSink, now: () => Date = () => new Date()) {
    this.sink = sink;
    this.now = now;
  }

  log(level: LogLevel, event: MirrorEvent, message: string, filePath?: string): void {
    this.sink.write({ timestamp: this.now(), level, event, message, path: filePath });
  }

  debug(event: MirrorEvent, message: string, filePath?: string): void {
    this.log('debug', event, message, filePath);
  }

  info(event: MirrorEvent, message: string, filePath?: string): void {
    this.log('info', event, message, filePath);
  }

  warn(event: MirrorEvent, message: string, filePath?: string): void {
    this.log('warn', event, message, filePath);
  }

  error(event: MirrorEvent, message: string, filePath?: string): void {
    this.log('error', event, message, filePath);
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a timestamp as local "YYYY-MM-DD HH:MM:SS".
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * One log file line: "2025-01-01 12:00:00 INFO Created: /replica/a.txt".
 */
export function formatLogLine(entry: LogEntry): string {
  return `${formatTimestamp(entry.timestamp)} ${entry.level.toUpperCase()} ${entry.message}`;
}

/**
 * Rotate a log file that exceeds the max size, and prune rotated files
 * older than MAX_LOG_AGE_DAYS.
 */
export function rotateLogIfNeeded(logFile: string, maxSize = MAX_LOG_SIZE): boolean {
  if (!fs.existsSync(logFile)) return false;

  let rotated = false;
  const stat = fs.statSync(logFile);
  if (stat.size > maxSize) {
    fs.renameSync(logFile, `${logFile}.${Date.now()}.old`);
    rotated = true;
  }

  const dir = path.dirname(logFile);
  const baseName = path.basename(logFile);
  const maxAge = MAX_LOG_AGE_DAYS * 24 * 60 * 60 * 1000;
  for (const entry of fs.readdirSync(dir)) {
    if (entry.startsWith(baseName + '.') && entry.endsWith('.old')) {
      const entryPath = path.join(dir, entry);
      if (Date.now() - fs.statSync(entryPath).mtimeMs > maxAge) {
        fs.unlinkSync(entryPath);
      }
    }
  }
  return rotated;
}

export interface FileSinkOptions {
  /** Minimum level written to the file (default: info) */
  level?: LogLevel;
  /** Rotate once the file grows past this many bytes (default: 10MB) */
  maxSize?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Append log lines to a file, creating its directory if needed.
 */
export function createFileSink(logFile: string, options: FileSinkOptions = {}): LogSink {
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];
  const maxSize = options.maxSize ?? MAX_LOG_SIZE;

  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  rotateLogIfNeeded(logFile, maxSize);
  let size = fs.existsSync(logFile) ? fs.statSync(logFile).size : 0;

  return {
    write(entry: LogEntry): void {
      if (LEVEL_ORDER[entry.level] < minLevel) return;
      const line = formatLogLine(entry) + '\n';
      fs.appendFileSync(logFile, line);
      size += Buffer.byteLength(line);
      if (size > maxSize && rotateLogIfNeeded(logFile, maxSize)) {
        size = 0;
      }
    },
  };
}

/**
 * Route log entries through the CLI output helper (stderr, colored).
 * Info events are per-entry detail on the console, so they only show with --verbose.
 */
export function createOutputSink(out: Output): LogSink {
  return {
    write(entry: LogEntry): void {
      switch (entry.level) {
        case 'warn':
          out.warn(entry.message);
          break;
        case 'error':
          out.error(entry.message);
          break;
        case 'debug':
        case 'info':
        default:
          out.debug(entry.message);
          break;
      }
    },
  };
}

/**
 * Write "[ISO timestamp] LEVEL message" lines to a stream (daemon stdout).
 */
export function createStreamSink(stream: NodeJS.WritableStream): LogSink {
  return {
    write(entry: LogEntry): void {
      stream.write(`[${entry.timestamp.toISOString()}] ${entry.level.toUpperCase()} ${entry.message}\n`);
    },
  };
}

/**
 * Fan one entry out to several sinks.
 */
export function combineSinks(...sinks: LogSink[]): LogSink {
  return {
    write(entry: LogEntry): void {
      for (const sink of sinks) {
        sink.write(entry);
      }
    },
  };
}

export const nullSink: LogSink = {
  write(): void {},
};
