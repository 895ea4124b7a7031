/**
 * Shared LLM Extraction Logic
 *
 * Prompt construction, the completion client seam, and parsing of the model's
 * JSON answer into a FinancialRecord.
 */

import OpenAI from 'openai';
import { logger } from '../logger';
import { AppError, errorMessage } from '../errors';
import { validateFinancialRecord } from '../schemas';
import type { ExtractionTemplate } from '../templates/types';
import {
  DEFAULT_COMPANY_NAME,
  DEFAULT_CURRENCY,
  DEFAULT_UNITS,
  MAX_FISCAL_YEARS,
  isLineItemKey,
  type FinancialRecord,
  type LineItemKey,
  type RawFinancialRecord,
  type YearValues,
} from '../types';

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  apiKey: string;
}

export interface CompletionResponse {
  /** Raw text content of the first choice */
  content: string;
  requestId: string;
  model: string;
}

/**
 * Black-box text completion. Rejects on any transport, auth or quota failure.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Completion client backed by the OpenAI chat completions API.
 */
export class OpenAiCompletionClient implements CompletionClient {
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!request.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    const openai = new OpenAI({
      apiKey: request.apiKey,
      timeout: request.timeoutMs,
      maxRetries: 0, // One attempt per upload; failures go back to the caller
    });

    const response = await openai.chat.completions.create({
      model: request.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      response_format: { type: 'json_object' },
      max_tokens: request.maxTokens,
      temperature: 0,
    });

    logger.info('OpenAI completion received', {
      model: response.model,
      request_id: response.id,
      tokens_used: response.usage?.total_tokens,
      finish_reason: response.choices[0]?.finish_reason,
    });

    return {
      content: response.choices[0]?.message?.content ?? '',
      requestId: response.id || `req_${Date.now()}`,
      model: response.model || request.model,
    };
  }
}

/**
 * Fill the template's user prompt with the first `maxChars` characters of
 * the document.
 */
export function buildUserPrompt(template: ExtractionTemplate, documentText: string, maxChars: number): string {
  return template.userPromptTemplate.replace('{{document_text}}', () => documentText.slice(0, maxChars));
}

function normalizeYearValues(raw: unknown): YearValues {
  const values: Record<string, number> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return values;
  }
  for (const [year, value] of Object.entries(raw)) {
    if (typeof value === 'number') {
      values[year] = value;
    }
  }
  return values;
}

/**
 * Apply defaults, drop unknown line items, null values and empty year maps.
 */
export function normalizeFinancialRecord(raw: RawFinancialRecord): FinancialRecord {
  const financialData: Partial<Record<LineItemKey, YearValues>> = {};
  const droppedKeys: string[] = [];

  for (const [key, yearValues] of Object.entries(raw.financial_data ?? {})) {
    if (!isLineItemKey(key)) {
      droppedKeys.push(key);
      continue;
    }
    const values = normalizeYearValues(yearValues);
    if (Object.keys(values).length > 0) {
      financialData[key] = values;
    }
  }

  if (droppedKeys.length > 0) {
    logger.debug('Dropped unrecognised line items from model output', { keys: droppedKeys });
  }

  return {
    company_name: raw.company_name || DEFAULT_COMPANY_NAME,
    fiscal_years: (raw.fiscal_years ?? []).map(String).slice(0, MAX_FISCAL_YEARS),
    financial_data: financialData,
    currency: raw.currency || DEFAULT_CURRENCY,
    units: raw.units || DEFAULT_UNITS,
    notes: raw.notes ?? [],
  };
}

/**
 * Parse the model's answer exactly as received. Markdown fences are not
 * stripped; the prompt forbids them.
 */
export function parseModelResponse(content: string): FinancialRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new AppError('extraction_failed', `Failed to parse financial data: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const validation = validateFinancialRecord(parsed);
  if (!validation.valid) {
    throw new AppError(
      'extraction_failed',
      `Failed to parse financial data: ${validation.errors.join('; ')}`
    );
  }

  return normalizeFinancialRecord(validation.value);
}
