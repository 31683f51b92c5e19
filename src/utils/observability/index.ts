export { LOG_LEVELS } from './types.js';
export type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel, ObservabilityOptions } from './types.js';
export { createRequestId, getLogContext, withLogContext } from './context.js';
export { createLogger, initObservability } from './logger.js';
export { redactSecrets, safeSnippet } from './redaction.js';
