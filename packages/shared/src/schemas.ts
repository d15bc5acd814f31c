/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for persisted roster documents.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { RosterDocument } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Compiled lazily on first use
let rosterDocumentValidator: ValidateFunction<RosterDocument> | null = null;

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output in dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getRosterDocumentValidator(): ValidateFunction<RosterDocument> {
  if (!rosterDocumentValidator) {
    rosterDocumentValidator = ajv.compile<RosterDocument>(loadSchema('roster_document.schema.json'));
  }
  return rosterDocumentValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Type guard for RosterDocument. Validation messages are appended to `errors`.
 */
export function isValidRosterDocument(data: unknown, errors: string[] = []): data is RosterDocument {
  const validate = getRosterDocumentValidator();
  if (validate(data)) {
    return true;
  }

  errors.push(...(validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`));
  logger.warn('RosterDocument validation failed', { errors });
  return false;
}

/**
 * Validate a RosterDocument against roster_document.schema.json
 */
export function validateRosterDocument(data: unknown): ValidationResult {
  const errors: string[] = [];
  return isValidRosterDocument(data, errors) ? { valid: true } : { valid: false, errors };
}
