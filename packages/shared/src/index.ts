/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { loadConfig, type Config } from './config';

// Types
export * from './types';

// Errors
export { AppError, isAppError, errorMessage, type AppErrorCode } from './errors';

// Metrics
export {
  register,
  enableDefaultMetrics,
  documentsProcessedCounter,
  extractionDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateFinancialRecord, schemas, type ValidationResult } from './schemas';

// Templates
export { FINANCIAL_STATEMENT_TEMPLATE, type ExtractionTemplate } from './templates';

// Financial data extractors
export {
  // Types
  type DocumentExtractor,
  type ExtractionContext,
  type ExtractorResult,
  type ExtractorMetadata,
  createExtractionContext,
  // Base class
  BaseExtractor,
  // Registry
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredStrategies,
  clearRegistry,
  registerAllExtractors,
  // LLM utilities
  OpenAiCompletionClient,
  buildUserPrompt,
  normalizeFinancialRecord,
  parseModelResponse,
  type CompletionClient,
  type CompletionRequest,
  type CompletionResponse,
  // Extractors
  HeuristicExtractor,
  heuristicExtractor,
  ModelAssistedExtractor,
  modelAssistedExtractor,
  // Heuristic algorithm exports for testing
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
} from './extractors';
