/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for pattern files, export requests and batch results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { ExportRequest, PatternFile } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const SCHEMA_FILES = {
  patternRegistry: 'pattern_registry.schema.json',
  exportRequest: 'export_request.schema.json',
  batchResult: 'batch_result.schema.json',
} as const;

type SchemaName = keyof typeof SCHEMA_FILES;

// Compiled lazily on first use
const validators = new Map<SchemaName, ValidateFunction>();

function loadSchema(schemaFile: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaFile),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaFile),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaFile),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaFile}, using permissive validation`);
  return { type: 'object' };
}

function getValidator(name: SchemaName): ValidateFunction {
  let validate = validators.get(name);
  if (!validate) {
    validate = ajv.compile(loadSchema(SCHEMA_FILES[name]));
    validators.set(name, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(name: SchemaName, data: unknown): ValidationResult {
  const validate = getValidator(name);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${SCHEMA_FILES[name]} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a custom pattern registry file against pattern_registry.schema.json
 */
export function validatePatternFile(data: unknown): ValidationResult {
  return runValidation('patternRegistry', data);
}

export function isPatternFile(data: unknown): data is PatternFile {
  return validatePatternFile(data).valid;
}

/**
 * Validate a POST /exports body against export_request.schema.json
 */
export function validateExportRequest(data: unknown): ValidationResult {
  return runValidation('exportRequest', data);
}

export function isExportRequest(data: unknown): data is ExportRequest {
  return validateExportRequest(data).valid;
}

/**
 * Validate a BatchResult against batch_result.schema.json
 */
export function validateBatchResult(data: unknown): ValidationResult {
  return runValidation('batchResult', data);
}
