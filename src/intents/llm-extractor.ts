/**
 * LLM Intent Extractor
 *
 * Sends the request to Claude with a fixed extraction prompt and validates
 * the JSON it answers with.
 */

import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { DateTime } from 'luxon';

import { getClient } from '../services/anthropic/client.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { createLogger, safeSnippet, type AppLogger } from '../utils/observability/index.js';
import { RawEntitiesSchema, RawExtractionSchema, normalizeIntents, presentEntities } from './normalize.js';
import { buildExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from './prompt.js';
import type { IntentExtraction, IntentExtractor } from './types.js';

export interface LlmIntentExtractorOptions {
  modelId: string;
  maxTokens?: number;
  /** Reference clock for resolving relative dates */
  now?: () => Date;
  logger?: AppLogger;
}

function extractionFailed(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, 'INTENT_EXTRACTION_FAILED', true, context);
}

/**
 * Parse the model's answer. Handles both clean JSON and JSON embedded in a
 * markdown code block.
 */
export function parseExtractionResponse(text: string): IntentExtraction {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonText = fenced ? fenced[1].trim() : text.trim();

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (error) {
    throw extractionFailed(`Intent extraction returned invalid JSON: ${errorMessage(error)}`, {
      text: safeSnippet(text, 500),
    });
  }

  const envelope = RawExtractionSchema.safeParse(raw);
  if (!envelope.success) {
    throw extractionFailed('Intent extraction returned an unexpected shape', {
      issues: envelope.error.issues.map((issue) => issue.message),
    });
  }

  const entities = RawEntitiesSchema.safeParse(envelope.data.entities);
  if (!entities.success) {
    throw extractionFailed('Intent extraction returned invalid entity values', {
      issues: entities.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return {
    intents: normalizeIntents(envelope.data.intents),
    entities: entities.data,
  };
}

export class LlmIntentExtractor implements IntentExtractor {
  readonly name = 'llm';
  private readonly modelId: string;
  private readonly maxTokens: number;
  private readonly now: () => Date;
  private readonly log: AppLogger;

  constructor(options: LlmIntentExtractorOptions) {
    this.modelId = options.modelId;
    this.maxTokens = options.maxTokens ?? 1024;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger({ domain: 'intent-extractor', operation: 'llm' });
  }

  async extract(query: string): Promise<IntentExtraction> {
    const anthropic = getClient();
    const today = DateTime.fromJSDate(this.now(), { zone: 'utc' }).toFormat('yyyy-MM-dd');
    const startTime = Date.now();

    const response = await anthropic.messages
      .create({
        model: this.modelId,
        max_tokens: this.maxTokens,
        temperature: 0,
        system: EXTRACTION_SYSTEM_PROMPT,
        messages: [
          { role: 'user', content: `${buildExtractionPrompt(today)}\n\nUser Request: "${query}"` },
        ],
      })
      .catch((error: unknown) => {
        this.log.error('intent_llm_request_failed', { error: errorMessage(error) });
        throw extractionFailed(`Intent extraction request failed: ${errorMessage(error)}`);
      });

    const textBlock = response.content.find(
      (block): block is TextBlock => block.type === 'text'
    );
    const extraction = parseExtractionResponse(textBlock?.text ?? '');

    this.log.info('intent_llm_extracted', {
      durationMs: Date.now() - startTime,
      intents: [...extraction.intents],
      entities: presentEntities(extraction.entities),
    });

    return extraction;
  }
}
