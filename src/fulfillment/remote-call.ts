/**
 * Outbound search/book calls to specialist services.
 *
 * One POST per call, bounded by a timeout, never retried. Every failure
 * surfaces as a RemoteCallError so the workflow can record it per domain.
 */

import type { ResolvedEndpoint } from '../registry/types.js';
import { endpointUrl } from '../registry/resolver.js';
import { RemoteCallError } from '../utils/errors.js';
import { describeFetchError } from '../utils/http.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';

export interface RemoteCallOptions {
  timeoutMs: number;
  logger?: AppLogger;
}

const defaultLogger = createLogger({ domain: 'remote-call' });

/** Drop null and undefined fields. */
export function compactPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const compact: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== null && value !== undefined) {
      compact[key] = value;
    }
  }
  return compact;
}

/**
 * Pull an error description out of a non-2xx body, if it has one.
 */
async function readErrorDetail(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }
  if (!text) return null;

  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    // Not JSON; fall through to the raw text
  }
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

/**
 * POST a payload to a resolved endpoint and return the parsed JSON body.
 *
 * @throws RemoteCallError on transport failure, timeout, non-2xx status or
 *   a body that is not JSON
 */
export async function callCapability(
  endpoint: ResolvedEndpoint,
  payload: Record<string, unknown>,
  options: RemoteCallOptions
): Promise<unknown> {
  const log = options.logger ?? defaultLogger;
  const url = endpointUrl(endpoint);
  const body = compactPayload(payload);
  const startTime = Date.now();

  log.debug('remote_call_started', { url, serviceId: endpoint.serviceId, payload: body });

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const cause = describeFetchError(error, options.timeoutMs);
    log.warn('remote_call_unreachable', { url, cause, durationMs: Date.now() - startTime });
    throw new RemoteCallError(`failed to reach ${url}: ${cause}`, url);
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response);
    log.warn('remote_call_rejected', { url, status: response.status, detail, durationMs: Date.now() - startTime });
    throw new RemoteCallError(
      `${url} answered HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
      url,
      response.status
    );
  }

  let result: unknown;
  try {
    result = await response.json();
  } catch (error) {
    throw new RemoteCallError(
      `${url} returned invalid JSON: ${describeFetchError(error, options.timeoutMs)}`,
      url,
      response.status
    );
  }

  log.debug('remote_call_finished', { url, status: response.status, durationMs: Date.now() - startTime });
  return result;
}
