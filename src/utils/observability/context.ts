/**
 * Request-scoped log context carried through async calls, so records from
 * the registry, extractor and workflows of one /planTrip share a request id.
 */

import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const requestScope = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` layered over any enclosing context. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return requestScope.run({ ...getLogContext(), ...context }, fn);
}

export function getLogContext(): LogContext {
  return requestScope.getStore() ?? {};
}

/** Short id such as "trip_3f9a0c1d2e4b" */
export function createRequestId(prefix = 'trip'): string {
  const suffix = randomUUID().replace(/-/g, '').slice(0, 12);
  return `${prefix}_${suffix}`;
}
