/**
 * Lazily created Anthropic client for the LLM intent extractor.
 *
 * Like calls to specialists, a model call gets one attempt bounded by
 * REMOTE_CALL_TIMEOUT_MS; the SDK's own retries are turned off.
 */

import Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { AppError } from '../../utils/errors.js';

let client: Anthropic | null = null;

export function getClient(): Anthropic {
  if (client) return client;

  const { anthropicApiKey } = config.intents;
  if (!anthropicApiKey) {
    throw new AppError('ANTHROPIC_API_KEY not configured', 'CONFIGURATION_ERROR');
  }
  client = new Anthropic({
    apiKey: anthropicApiKey,
    maxRetries: 0,
    timeout: config.remoteCall.timeoutMs,
  });
  return client;
}
