/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for exported statement records.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { config } from './config';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});

// Schema loading - lazy loaded on first use
let statementRecordSchema: object | null = null;
let statementRecordValidator: ValidateFunction | null = null;

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Explicit override
    ...(config.contractsPath ? [path.join(config.contractsPath, schemaName)] : []),
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output in dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (isObject(parsed)) {
      logger.debug('Loaded schema', { schemaPath });
      return parsed;
    }
  }

  // Permissive schema when the contracts directory is not shipped alongside the build
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getStatementRecordSchema(): object {
  if (!statementRecordSchema) {
    statementRecordSchema = loadSchema('statement_record.schema.json');
  }
  return statementRecordSchema;
}

function getStatementRecordValidator(): ValidateFunction {
  if (!statementRecordValidator) {
    statementRecordValidator = ajv.compile(getStatementRecordSchema());
  }
  return statementRecordValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a StatementRecord against statement_record.schema.json
 */
export function validateStatementRecord(data: unknown): ValidationResult {
  const validate = getStatementRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('StatementRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

export const schemas = {
  get statementRecord() {
    return getStatementRecordSchema();
  },
};
