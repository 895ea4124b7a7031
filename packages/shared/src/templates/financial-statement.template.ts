/**
 * Financial Statement Extraction Template
 *
 * Document semantics:
 * - One company, up to three fiscal years, most recent first
 * - Eleven fixed line items; anything else is ignored by the renderer
 * - Values are copied as stated; no unit conversion
 */

import type { ExtractionTemplate } from './types';

export const FINANCIAL_STATEMENT_TEMPLATE: ExtractionTemplate = {
  name: 'financial-statement',
  description: 'Income statement and balance sheet line items across fiscal years',

  systemPrompt: `You are a financial analyst. You extract financial statement data from documents and answer with JSON only.

Return ONLY a valid JSON object (no markdown, no code blocks) with this exact structure:
{
  "company_name": "company name or 'Unknown'",
  "fiscal_years": ["2024", "2023", "2022"],
  "financial_data": {
    "revenue": {"2024": 123456.00, "2023": 120000.00},
    "cost_of_revenue": {"2024": 50000.00},
    "gross_profit": {"2024": 73456.00},
    "operating_expenses": {"2024": 30000.00},
    "operating_income": {"2024": 43456.00},
    "interest_expense": {},
    "tax_expense": {"2024": 8000.00},
    "net_income": {"2024": 35456.00},
    "total_assets": {"2024": 500000.00},
    "total_liabilities": {"2024": 200000.00},
    "shareholders_equity": {"2024": 300000.00}
  },
  "currency": "USD",
  "units": "thousands or actual",
  "notes": ["any missing data or assumptions"]
}

EXTRACTION RULES:
1. Extract ONLY numbers that are explicitly stated in the document
2. Do NOT hallucinate or estimate values
3. If a line item is not found, omit it from the object
4. Preserve the original numbers (do not convert units unless stated)
5. If currency or units are unclear, say so in "notes"
6. Extract all years of data present, most recent first, at most three
7. Return ONLY the JSON object, nothing else`,

  userPromptTemplate: `Extract financial statement data from this document.

DOCUMENT TEXT:
{{document_text}}`,
};
