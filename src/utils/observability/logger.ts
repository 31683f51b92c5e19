/**
 * NDJSON logger.
 *
 * One JSON object per line: warn and error to stderr, the rest to stdout,
 * filtered by LOG_LEVEL (default info, error under test). In development
 * every record, whatever its level, is also appended to
 * APP_LOG_DIR/<date>/<service>.ndjson unless APP_LOG_FILE overrides the
 * path or is "off".
 */

import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import {
  LOG_LEVELS,
  type AppLogger,
  type AppLogRecord,
  type LogContext,
  type LogData,
  type LogLevel,
  type ObservabilityOptions,
} from './types.js';

let serviceName: string | null = null;
let exitHookInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function threshold(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

function logFilePath(): string | null {
  if (process.env.NODE_ENV !== 'development') return null;

  const override = process.env.APP_LOG_FILE;
  if (override === 'off') return null;
  if (override) return override;

  const day = new Date().toISOString().slice(0, 10);
  return join(process.env.APP_LOG_DIR || './logs', day, `${serviceName ?? 'app'}.ndjson`);
}

function closeFileSink(): void {
  fileSink?.stream.end();
  fileSink = null;
}

function openFileSink(path: string): WriteStream | null {
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`log file sink error: ${error.message}\n`);
      fileSink = null;
    });
    fileSink = { path, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
    return null;
  }
}

/** The open sink for today's path; reopened when the path changes. */
function currentFileSink(): WriteStream | null {
  const path = logFilePath();
  if (!path) return null;
  if (fileSink?.path === path) return fileSink.stream;

  closeFileSink();
  return openFileSink(path);
}

function buildRecord(level: LogLevel, event: string, context: LogContext, data?: LogData): AppLogRecord {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...(serviceName ? { service: serviceName } : {}),
    ...getLogContext(),
    ...context,
    ...(data ? redactSecrets(data) : {}),
  };
}

function write(record: AppLogRecord): void {
  const line = `${JSON.stringify(record)}\n`;
  if (severity(record.level) >= severity(threshold())) {
    const target = record.level === 'warn' || record.level === 'error' ? process.stderr : process.stdout;
    target.write(line);
  }
  currentFileSink()?.write(line);
}

export function createLogger(context: LogContext = {}): AppLogger {
  const at = (level: LogLevel) => (event: string, data?: LogData) => write(buildRecord(level, event, context, data));

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    child: (extra: LogContext) => createLogger({ ...context, ...extra }),
  };
}

/**
 * Name the process for every later record and close the file sink on exit.
 * Called once by each entry point.
 */
export function initObservability(options: ObservabilityOptions): void {
  serviceName = options.service;
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', closeFileSink);
}
