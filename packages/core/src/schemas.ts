/**
 * JSON Schema Validation
 *
 * Validates claim results against docs/contracts/claim_result.schema.json.
 */

import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import claimResultSchema from '../../../docs/contracts/claim_result.schema.json';
import { logger } from './logger';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

const validateClaimResultSchema = ajv.compile(claimResultSchema);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a ClaimResult (or anything claiming to be one)
 */
export function validateClaimResult(data: unknown): ValidationResult {
  const valid = validateClaimResultSchema(data);

  if (!valid) {
    const errors = (validateClaimResultSchema.errors ?? []).map(
      (e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`
    );
    logger.warn('ClaimResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
