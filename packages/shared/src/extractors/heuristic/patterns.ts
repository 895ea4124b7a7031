/**
 * Heuristic Extraction Patterns
 *
 * Regular expressions and keyword checks used to pull company name, currency,
 * units, fiscal years and line-item values out of raw statement text.
 */

import type { LineItemKey } from '../../types';
import { DEFAULT_COMPANY_NAME, MAX_FISCAL_YEARS } from '../../types';

/**
 * Capitalised phrase ending in a corporate suffix, e.g. "ACME INDUSTRIES",
 * "Tata Steel LIMITED". Case-sensitive on the suffix.
 */
export const COMPANY_NAME_PATTERN =
  /([A-Z][A-Za-z\s&]+(?:LIMITED|LTD|CORPORATION|CORP|INC|INDUSTRIES))/;

export const FISCAL_YEAR_PATTERN = /\b(20\d{2})\b/g;

export const DEFAULT_FISCAL_YEARS: readonly string[] = ['2024', '2023'];

/**
 * Numeric token: digits with optional thousands separators and decimals.
 * Also matches stray commas; those are rejected by parseNumericToken.
 */
export const NUMBER_PATTERN = /[\d,]+\.?\d*/g;

const RUPEE_SIGN = '₹';

/**
 * Label variants per line item, in priority order. The first variant that
 * matches any line decides the line for that item.
 */
export const LINE_ITEM_PATTERNS: Record<LineItemKey, readonly RegExp[]> = {
  revenue: [/revenue\s+from\s+operations/i, /total\s+revenue/i, /sales/i, /net\s+revenue/i, /revenues/i],
  cost_of_revenue: [/cost\s+of\s+(?:revenue|goods\s+sold|materials)/i, /cogs/i, /cost\s+of\s+sales/i],
  gross_profit: [/gross\s+profit/i, /gross\s+margin/i],
  operating_expenses: [/operating\s+(?:expenses|costs)/i, /sga/i, /selling.*administrative/i],
  operating_income: [/operating\s+(?:income|profit)/i, /ebit/i],
  interest_expense: [/interest\s+(?:expense|paid)/i],
  tax_expense: [/(?:income\s+)?tax\s+(?:expense|cost)/i, /provision\s+for\s+taxes/i],
  net_income: [/net\s+(?:income|profit)/i, /earnings/i, /net\s+earnings/i],
  total_assets: [/total\s+assets/i],
  total_liabilities: [/total\s+liabilities/i],
  shareholders_equity: [/(?:shareholders|stockholders)\s+equity/i, /total\s+equity/i],
};

export function extractCompanyName(text: string): string {
  const match = text.match(COMPANY_NAME_PATTERN);
  return match ? match[1].trim() : DEFAULT_COMPANY_NAME;
}

function mentionsCrores(text: string): boolean {
  return text.toLowerCase().includes('crores');
}

export function detectCurrency(text: string): string {
  return text.includes(RUPEE_SIGN) || mentionsCrores(text) ? 'INR' : 'USD';
}

export function detectUnits(text: string): string {
  return mentionsCrores(text) ? 'Crores' : 'Actual';
}

/**
 * Distinct 20xx years, most recent first, at most three.
 */
export function extractFiscalYears(text: string): string[] {
  const years = new Set<string>();
  for (const match of text.matchAll(FISCAL_YEAR_PATTERN)) {
    years.add(match[1]);
  }

  if (years.size === 0) {
    return [...DEFAULT_FISCAL_YEARS];
  }

  return Array.from(years)
    .sort((a, b) => (a < b ? 1 : a > b ? -1 : 0))
    .slice(0, MAX_FISCAL_YEARS);
}

export function extractNumericTokens(line: string): string[] {
  return line.match(NUMBER_PATTERN) ?? [];
}

/**
 * "1,234.50" -> 1234.5. Returns null for tokens without a usable number
 * (a lone comma, "," followed by ".").
 */
export function parseNumericToken(token: string): number | null {
  const cleaned = token.replace(/,/g, '');
  if (!/\d/.test(cleaned)) return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}
