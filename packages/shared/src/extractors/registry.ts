/**
 * Extractor Registry
 *
 * Maps each extraction strategy to the extractor that implements it.
 */

import type { ExtractionStrategy } from '../types';
import type { DocumentExtractor } from './types';
import { logger } from '../logger';

const extractorRegistry = new Map<ExtractionStrategy, DocumentExtractor>();

/**
 * Register an extractor for its strategy.
 * Overwrites any existing extractor for that strategy.
 */
export function registerExtractor(extractor: DocumentExtractor): void {
  extractorRegistry.set(extractor.strategy, extractor);

  logger.debug('Registered extractor', {
    strategy: extractor.strategy,
    description: extractor.description,
  });
}

export function getExtractor(strategy: ExtractionStrategy): DocumentExtractor | undefined {
  return extractorRegistry.get(strategy);
}

/**
 * Get the extractor for a strategy, throwing if none is registered.
 */
export function getExtractorOrThrow(strategy: ExtractionStrategy): DocumentExtractor {
  const extractor = extractorRegistry.get(strategy);
  if (!extractor) {
    throw new Error(`No extractor registered for strategy: ${strategy}`);
  }
  return extractor;
}

export function hasExtractor(strategy: ExtractionStrategy): boolean {
  return extractorRegistry.has(strategy);
}

export function getRegisteredStrategies(): ExtractionStrategy[] {
  return Array.from(extractorRegistry.keys());
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}
