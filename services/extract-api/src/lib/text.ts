/**
 * Document Text Extraction
 *
 * Turns an uploaded PDF, TXT or DOCX file into plain text.
 */

import fs from 'fs';
import mammoth from 'mammoth';
import { AppError, errorMessage, logger } from '@finsheet/shared';
import { extractTextFromPdf } from './pdf';

// Invalid UTF-8 is an error, not replacement characters; a BOM is kept as text.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export const SUPPORTED_EXTENSIONS = ['pdf', 'txt', 'docx'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * mammoth ends every paragraph with a blank line; keep one paragraph per line.
 */
export function normalizeDocxText(rawText: string): string {
  return rawText.replace(/\n\n/g, '\n').replace(/\n$/, '');
}

async function readPdf(filePath: string): Promise<string> {
  try {
    const result = await extractTextFromPdf(filePath);
    return result.combinedText;
  } catch (error) {
    throw new AppError('unreadable_document', `Error reading PDF: ${errorMessage(error)}`, { cause: error });
  }
}

async function readTxt(filePath: string): Promise<string> {
  try {
    const bytes = await fs.promises.readFile(filePath);
    return utf8Decoder.decode(bytes);
  } catch (error) {
    throw new AppError('unreadable_document', `Error reading text file: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function readDocx(filePath: string): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ path: filePath });
    if (result.messages.length > 0) {
      logger.debug('DOCX conversion messages', {
        messages: result.messages.map((m) => m.message),
      });
    }
    return normalizeDocxText(result.value);
  } catch (error) {
    throw new AppError('unreadable_document', `Error reading DOCX: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Extract plain text from a file of the given (lower-case) extension.
 */
export async function extractDocumentText(filePath: string, extension: string): Promise<string> {
  if (!isSupportedExtension(extension)) {
    throw new AppError('unsupported_type', 'Unsupported file type');
  }

  switch (extension) {
    case 'pdf':
      return readPdf(filePath);
    case 'txt':
      return readTxt(filePath);
    case 'docx':
      return readDocx(filePath);
  }
}
