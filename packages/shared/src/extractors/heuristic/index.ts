/**
 * Heuristic Extractor
 *
 * Regex/keyword extraction over raw text. Never calls out of process, so the
 * only failures are unexpected internal errors ('extraction_failed').
 */

import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, ExtractorResult, ExtractionStrategy } from '../types';
import { parseFinancialStatement, ALGORITHM_VERSION } from './parser';
import { logger } from '../../logger';

export class HeuristicExtractor extends BaseExtractor {
  readonly strategy: ExtractionStrategy = 'heuristic';
  readonly description = 'Pattern matching over statement text with positional year alignment';

  protected async extractRecord(text: string, _ctx: ExtractionContext): Promise<ExtractorResult> {
    const record = parseFinancialStatement(text);

    logger.debug('Heuristic extraction result', {
      algorithm_version: ALGORITHM_VERSION,
      fiscal_years: record.fiscal_years,
      line_items: Object.keys(record.financial_data),
      currency: record.currency,
      units: record.units,
    });

    return {
      record,
      extractionMethod: 'heuristic',
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
      },
    };
  }
}

export const heuristicExtractor = new HeuristicExtractor();

// Re-export patterns and parser for testing
export * from './patterns';
export * from './parser';
