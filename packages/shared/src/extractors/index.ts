/**
 * Financial Data Extractors Module
 *
 * Two interchangeable strategies behind one interface:
 * - 'heuristic': pattern matching over raw text (default)
 * - 'model_assisted': language-model extraction with a JSON contract
 */

// Core types and interfaces
export type {
  DocumentExtractor,
  ExtractionStrategy,
  ExtractionContext,
  ExtractorResult,
  ExtractorMetadata,
} from './types';

// Context
export { createExtractionContext } from './extraction-context';

// Base class
export { BaseExtractor } from './base-extractor';

// Registry
export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredStrategies,
  clearRegistry,
} from './registry';

// LLM extraction utilities
export {
  OpenAiCompletionClient,
  buildUserPrompt,
  normalizeFinancialRecord,
  parseModelResponse,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
} from './llm-extraction';

// Individual extractors
export {
  HeuristicExtractor,
  heuristicExtractor,
  // Patterns and parser, exported for testing
  COMPANY_NAME_PATTERN,
  DEFAULT_FISCAL_YEARS,
  LINE_ITEM_PATTERNS,
  extractCompanyName,
  detectCurrency,
  detectUnits,
  extractFiscalYears,
  extractNumericTokens,
  parseNumericToken,
  findLabelLine,
  alignValuesToYears,
  extractLineItems,
  parseFinancialStatement,
  HEURISTIC_NOTES,
  ALGORITHM_VERSION,
} from './heuristic';
export { ModelAssistedExtractor, modelAssistedExtractor } from './model-assisted';

// Import for registration
import { registerExtractor } from './registry';
import { heuristicExtractor } from './heuristic';
import { modelAssistedExtractor } from './model-assisted';

/**
 * Register both built-in extractors.
 */
export function registerAllExtractors(): void {
  registerExtractor(heuristicExtractor);
  registerExtractor(modelAssistedExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
