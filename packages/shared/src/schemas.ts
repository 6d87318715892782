/**
 * JSON Schema Validation
 *
 * Ajv validators for the model's record payload (generated from the field
 * catalogue) and the ExtractionResult contract in docs/contracts/.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv2020 from 'ajv/dist/2020.js';
import type { ValidateFunction } from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { FIELD_LABELS, FINANCIAL_FIELDS } from './fields';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

/**
 * Record payload schema. Also sent to the model as the structured-output
 * contract, so it stays within the subset strict mode accepts.
 */
export const RECORD_JSON_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: [...FINANCIAL_FIELDS],
  properties: Object.fromEntries(
    FINANCIAL_FIELDS.map((field) => [
      field,
      { type: ['number', 'null'], description: `${FIELD_LABELS[field].label}: ${FIELD_LABELS[field].description}` },
    ])
  ),
};

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Repository layout: packages/shared/src → docs/contracts
    path.join(moduleDir, '../../../docs/contracts', schemaName),
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

let recordValidator: ValidateFunction | null = null;
let extractionResultValidator: ValidateFunction | null = null;

function getRecordValidator(): ValidateFunction {
  if (!recordValidator) {
    recordValidator = ajv.compile(RECORD_JSON_SCHEMA);
  }
  return recordValidator;
}

function getExtractionResultValidator(): ValidateFunction {
  if (!extractionResultValidator) {
    extractionResultValidator = ajv.compile(loadSchema('extraction_result.schema.json'));
  }
  return extractionResultValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function run(validate: ValidateFunction, data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true };
  }
  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  return { valid: false, errors };
}

/**
 * Validate a normalized model payload against the record schema
 */
export function validateRecordPayload(data: unknown): ValidationResult {
  return run(getRecordValidator(), data);
}

/**
 * Validate an ExtractionResult against extraction_result.schema.json
 */
export function validateExtraction(data: unknown): ValidationResult {
  const result = run(getExtractionResultValidator(), data);
  if (!result.valid) {
    logger.warn('ExtractionResult validation failed', { errors: result.errors });
  }
  return result;
}
