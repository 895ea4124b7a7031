/**
 * JSON Schema Validation
 *
 * Shape-checks model output with Ajv before it is normalised into a
 * FinancialRecord.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { RawFinancialRecord } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});

// Schema loading - lazy loaded on first use
let financialRecordSchema: SchemaObject | null = null;
let financialRecordValidator: ValidateFunction<RawFinancialRecord> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Permissive schema if the file is not shipped alongside the build
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getFinancialRecordSchema(): SchemaObject {
  if (!financialRecordSchema) {
    financialRecordSchema = loadSchema('financial_record.schema.json');
  }
  return financialRecordSchema;
}

function getFinancialRecordValidator(): ValidateFunction<RawFinancialRecord> {
  if (!financialRecordValidator) {
    financialRecordValidator = ajv.compile<RawFinancialRecord>(getFinancialRecordSchema());
  }
  return financialRecordValidator;
}

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

/**
 * Validate model output against financial_record.schema.json
 */
export function validateFinancialRecord(data: unknown): ValidationResult<RawFinancialRecord> {
  const validate = getFinancialRecordValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn('FinancialRecord validation failed', { errors });
  return { valid: false, errors };
}

export const schemas = {
  get financialRecord() {
    return getFinancialRecordSchema();
  },
};
