/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * `loadConfig` is called once at startup and the result is passed to the
 * request handlers.
 */

import os from 'node:os';
import { isExtractionStrategy, type ExtractionStrategy } from './types';

export interface Config {
  // HTTP
  port: number;

  // Uploads
  uploadDir: string;
  maxUploadBytes: number;
  minDocumentChars: number;

  // Extraction
  extractionStrategy: ExtractionStrategy;

  // LLM
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmMaxTokens: number;
  llmMaxDocumentChars: number;
  openaiApiKey: string;
}

function parseStrategy(value: string | undefined): ExtractionStrategy {
  const strategy = value || 'heuristic';
  if (!isExtractionStrategy(strategy)) {
    throw new Error(`Invalid EXTRACTION_STRATEGY: ${strategy} (expected heuristic or model_assisted)`);
  }
  return strategy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    // HTTP
    port: parseInt(env.PORT || '5000', 10),

    // Uploads
    uploadDir: env.UPLOAD_DIR || os.tmpdir(),
    maxUploadBytes: parseInt(env.MAX_UPLOAD_BYTES || String(25 * 1024 * 1024), 10),
    minDocumentChars: parseInt(env.MIN_DOCUMENT_CHARS || '100', 10),

    // Extraction
    extractionStrategy: parseStrategy(env.EXTRACTION_STRATEGY),

    // LLM
    llmModel: env.LLM_MODEL || 'gpt-4o-mini',
    llmRequestTimeoutMs: parseInt(env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
    llmMaxTokens: parseInt(env.LLM_MAX_TOKENS || '2000', 10),
    llmMaxDocumentChars: parseInt(env.LLM_MAX_DOCUMENT_CHARS || '8000', 10),
    openaiApiKey: env.OPENAI_API_KEY || '',
  };
}
