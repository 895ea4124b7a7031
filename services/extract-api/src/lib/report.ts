/**
 * Report pipeline: uploaded file -> text -> FinancialRecord -> XLSX bytes.
 */

import fs from 'fs';
import {
  AppError,
  createExtractionContext,
  errorMessage,
  getCorrelationId,
  getExtractorOrThrow,
  logger,
  type Config,
  type ExtractionContext,
  type FinancialRecord,
} from '@finsheet/shared';
import { extractDocumentText } from './text';
import { fileExtension } from './upload';
import { renderWorkbook, workbookFilename } from './workbook';

/** The parts of a stored upload the pipeline needs. */
export interface StoredUpload {
  originalname: string;
  path: string;
}

export interface Report {
  record: FinancialRecord;
  filename: string;
  content: Buffer;
}

export function extractionContext(config: Config): ExtractionContext {
  return createExtractionContext(config, getCorrelationId());
}

async function removeUpload(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    logger.warn('Failed to remove uploaded file', {
      filePath,
      error: errorMessage(error),
    });
  }
}

/**
 * Build the XLSX report for one stored upload. The upload is removed before
 * this resolves or rejects.
 */
export async function buildReport(upload: StoredUpload, config: Config): Promise<Report> {
  try {
    const text = await extractDocumentText(upload.path, fileExtension(upload.originalname));

    if (text.trim().length < config.minDocumentChars) {
      throw new AppError('document_too_short', 'Document appears to be empty or unreadable');
    }

    const extractor = getExtractorOrThrow(config.extractionStrategy);
    const result = await extractor.extract(text, extractionContext(config));

    const content = await renderWorkbook(result.record);

    logger.info('Report rendered', {
      strategy: result.extractionMethod,
      company_name: result.record.company_name,
      size_bytes: content.length,
    });

    return {
      record: result.record,
      filename: workbookFilename(result.record.company_name),
      content,
    };
  } finally {
    await removeUpload(upload.path);
  }
}
