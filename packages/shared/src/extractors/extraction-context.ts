import type { Config } from '../config';
import type { ExtractionContext } from './types';

/**
 * Extraction settings for one request, taken from the service config.
 */
export function createExtractionContext(config: Config, correlationId: string): ExtractionContext {
  return {
    correlationId,
    openaiApiKey: config.openaiApiKey,
    extractionModel: config.llmModel,
    timeoutMs: config.llmRequestTimeoutMs,
    maxTokens: config.llmMaxTokens,
    maxDocumentChars: config.llmMaxDocumentChars,
  };
}
