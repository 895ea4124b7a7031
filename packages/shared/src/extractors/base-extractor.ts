/**
 * Base Financial Data Extractor
 *
 * Abstract base class providing logging, timing, metrics and error
 * normalisation for both extraction strategies.
 */

import type { ExtractionStrategy } from '../types';
import type { DocumentExtractor, ExtractionContext, ExtractorResult } from './types';
import { AppError, errorMessage, isAppError } from '../errors';
import { documentsProcessedCounter, extractionDurationHistogram } from '../metrics';
import { logger } from '../logger';

export abstract class BaseExtractor implements DocumentExtractor {
  abstract readonly strategy: ExtractionStrategy;
  abstract readonly description: string;

  /**
   * Strategy-specific extraction. Errors that are not AppErrors are reported
   * as 'extraction_failed'.
   */
  protected abstract extractRecord(text: string, ctx: ExtractionContext): Promise<ExtractorResult>;

  async extract(text: string, ctx: ExtractionContext): Promise<ExtractorResult> {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      strategy: this.strategy,
      text_length: text.length,
    });

    try {
      const result = await this.extractRecord(text, ctx);

      const durationMs = Date.now() - startTime;
      result.metadata.durationMs = durationMs;

      extractionDurationHistogram.observe({ strategy: this.strategy }, durationMs / 1000);
      documentsProcessedCounter.inc({ strategy: this.strategy, status: 'success' });

      logger.info('Extraction complete', {
        strategy: this.strategy,
        company_name: result.record.company_name,
        fiscal_years: result.record.fiscal_years,
        line_item_count: Object.keys(result.record.financial_data).length,
        duration_ms: durationMs,
      });

      return result;
    } catch (error) {
      documentsProcessedCounter.inc({ strategy: this.strategy, status: 'error' });

      logger.error('Extraction failed', error, {
        strategy: this.strategy,
      });

      if (isAppError(error)) {
        throw error;
      }
      throw new AppError(
        'extraction_failed',
        `Error extracting financial data: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
