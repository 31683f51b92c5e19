/**
 * Intent understanding: free text to intents and entity slots.
 */

import type { AppConfig } from '../config.js';
import { KeywordIntentExtractor } from './keyword-extractor.js';
import { LlmIntentExtractor } from './llm-extractor.js';
import type { IntentExtractor } from './types.js';

export * from './types.js';
export { hasUsableContent, MAX_PARTY_SIZE, normalizeEntities, normalizeIntents, presentEntities, toExtraction } from './normalize.js';
export { KeywordIntentExtractor, type KeywordIntentExtractorOptions } from './keyword-extractor.js';
export { LlmIntentExtractor, parseExtractionResponse, type LlmIntentExtractorOptions } from './llm-extractor.js';

export function createIntentExtractor(settings: AppConfig['intents']): IntentExtractor {
  if (settings.provider === 'llm') {
    return new LlmIntentExtractor({ modelId: settings.modelId });
  }
  return new KeywordIntentExtractor({
    defaultOrigin: settings.defaultOrigin,
    defaultDestination: settings.defaultDestination,
  });
}
