/**
 * Domain types for financial statement extraction.
 */

/**
 * Fixed line-item vocabulary, in report order.
 */
export const LINE_ITEM_KEYS = [
  'revenue',
  'cost_of_revenue',
  'gross_profit',
  'operating_expenses',
  'operating_income',
  'interest_expense',
  'tax_expense',
  'net_income',
  'total_assets',
  'total_liabilities',
  'shareholders_equity',
] as const;

export type LineItemKey = (typeof LINE_ITEM_KEYS)[number];

export const LINE_ITEM_LABELS: Record<LineItemKey, string> = {
  revenue: 'Revenue',
  cost_of_revenue: 'Cost of Revenue',
  gross_profit: 'Gross Profit',
  operating_expenses: 'Operating Expenses',
  operating_income: 'Operating Income',
  interest_expense: 'Interest Expense',
  tax_expense: 'Tax Expense',
  net_income: 'Net Income',
  total_assets: 'Total Assets',
  total_liabilities: 'Total Liabilities',
  shareholders_equity: "Shareholders' Equity",
};

export function isLineItemKey(key: string): key is LineItemKey {
  return LINE_ITEM_KEYS.some((k) => k === key);
}

/** Fiscal year label -> value. A missing year is simply absent. */
export type YearValues = Readonly<Record<string, number>>;

export type FinancialData = Readonly<Partial<Record<LineItemKey, YearValues>>>;

/**
 * The structured result of one extraction. Built once per request and
 * discarded after rendering.
 */
export interface FinancialRecord {
  readonly company_name: string;
  /** Most recent first, at most three. */
  readonly fiscal_years: readonly string[];
  readonly financial_data: FinancialData;
  readonly currency: string;
  readonly units: string;
  readonly notes: readonly string[];
}

export const DEFAULT_COMPANY_NAME = 'Unknown';
export const DEFAULT_CURRENCY = 'Unknown';
export const DEFAULT_UNITS = 'Actual';
export const MAX_FISCAL_YEARS = 3;

/**
 * Record shape as received from the model, before normalisation.
 */
export interface RawFinancialRecord {
  company_name?: string;
  fiscal_years?: Array<string | number>;
  /** Vocabulary keys hold year maps; any other key may hold anything. */
  financial_data?: Record<string, unknown>;
  currency?: string;
  units?: string;
  notes?: string[];
}

/**
 * Extraction strategies. Exactly one is active per deployment.
 */
export type ExtractionStrategy = 'heuristic' | 'model_assisted';

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = ['heuristic', 'model_assisted'];

export function isExtractionStrategy(value: string): value is ExtractionStrategy {
  return EXTRACTION_STRATEGIES.some((s) => s === value);
}

export interface HealthResponse {
  status: 'ok';
}

export interface ErrorResponse {
  error: string;
}
