/**
 * Heuristic Financial Statement Parser
 *
 * Line-oriented scan of statement text. For each line item the first label
 * variant that hits a line wins, and the first hit line wins; numbers on that
 * line are paired with fiscal years purely by position. This is a
 * low-precision fallback and the pairing can misattribute values (for
 * example a note reference "(Note 12)" becomes the most recent year's value).
 */

import type { FinancialData, FinancialRecord, LineItemKey, YearValues } from '../../types';
import { LINE_ITEM_KEYS } from '../../types';
import {
  LINE_ITEM_PATTERNS,
  detectCurrency,
  detectUnits,
  extractCompanyName,
  extractFiscalYears,
  extractNumericTokens,
  parseNumericToken,
} from './patterns';

export const ALGORITHM_VERSION = '1.0.0';

export const HEURISTIC_NOTES: readonly string[] = [
  'Data extracted using pattern matching',
  'Some values may be approximate if document format varies',
  'Manual review recommended for accuracy',
];

/**
 * First line matched by the highest-priority pattern that matches anything.
 */
export function findLabelLine(lines: readonly string[], patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const line = lines.find((candidate) => pattern.test(candidate));
    if (line !== undefined) {
      return line;
    }
  }
  return null;
}

/**
 * Pair the i-th numeric token on the line with the i-th fiscal year.
 * Tokens that are not numbers leave their year empty without shifting the rest.
 */
export function alignValuesToYears(line: string, fiscalYears: readonly string[]): YearValues {
  const tokens = extractNumericTokens(line);
  const values: Record<string, number> = {};

  fiscalYears.forEach((year, index) => {
    if (index >= tokens.length) return;

    const value = parseNumericToken(tokens[index]);
    if (value !== null) {
      values[year] = value;
    }
  });

  return values;
}

export function extractLineItems(text: string, fiscalYears: readonly string[]): FinancialData {
  const lines = text.split('\n');
  const data: Partial<Record<LineItemKey, YearValues>> = {};

  for (const key of LINE_ITEM_KEYS) {
    const line = findLabelLine(lines, LINE_ITEM_PATTERNS[key]);
    if (line === null) continue;

    const values = alignValuesToYears(line, fiscalYears);
    if (Object.keys(values).length > 0) {
      data[key] = values;
    }
  }

  return data;
}

/**
 * Parse raw statement text into a best-effort FinancialRecord.
 */
export function parseFinancialStatement(text: string): FinancialRecord {
  const fiscalYears = extractFiscalYears(text);

  return {
    company_name: extractCompanyName(text),
    fiscal_years: fiscalYears,
    financial_data: extractLineItems(text, fiscalYears),
    currency: detectCurrency(text),
    units: detectUnits(text),
    notes: [...HEURISTIC_NOTES],
  };
}
