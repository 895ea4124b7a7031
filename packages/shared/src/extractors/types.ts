/**
 * Financial Data Extractor Types
 *
 * Both strategies turn raw document text into a FinancialRecord:
 * - 'heuristic': regex/keyword scanning of the text
 * - 'model_assisted': delegation to a language model returning JSON
 */

import type { ExtractionStrategy, FinancialRecord } from '../types';

export type { ExtractionStrategy };

/**
 * Context passed to extractors during extraction
 */
export interface ExtractionContext {
  /** Correlation ID for tracing */
  correlationId: string;
  /** OpenAI API key; empty when not configured */
  openaiApiKey: string;
  /** LLM model to use for extraction */
  extractionModel: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Completion token cap */
  maxTokens: number;
  /** Characters of document text sent to the model */
  maxDocumentChars: number;
}

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  record: FinancialRecord;
  /** How extraction was performed */
  extractionMethod: ExtractionStrategy;
  metadata: ExtractorMetadata;
}

export interface ExtractorMetadata {
  /** LLM model used (if any) */
  model?: string;
  /** LLM request ID (if any) */
  requestId?: string;
  /** Algorithm version (for heuristic extraction) */
  algorithmVersion?: string;
  durationMs?: number;
}

/**
 * Interface shared by both extraction strategies.
 */
export interface DocumentExtractor {
  readonly strategy: ExtractionStrategy;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract a financial record from raw document text.
   * Rejects with an AppError ('extraction_failed' or 'service_error').
   */
  extract(text: string, ctx: ExtractionContext): Promise<ExtractorResult>;
}
