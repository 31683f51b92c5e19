/**
 * Structured log record types shared by the planner and the specialists.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Fields merged into every record written while the context is active.
 * `domain` names the emitting component (e.g. "fulfillment.hotel").
 */
export type LogContext = {
  requestId?: string;
  domain?: string;
  operation?: string;
  serviceId?: string;
  capabilityId?: string;
  [key: string]: unknown;
};

export type LogData = Record<string, unknown>;

export type AppLogRecord = {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Process that wrote the record: "planner" or "specialists" */
  service?: string;
} & LogContext & LogData;

export interface ObservabilityOptions {
  service: string;
}

export interface AppLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
  child(context: LogContext): AppLogger;
}
