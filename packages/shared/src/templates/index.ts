/**
 * Extraction Templates
 */

export type { ExtractionTemplate } from './types';
export { FINANCIAL_STATEMENT_TEMPLATE } from './financial-statement.template';
