/**
 * Routing and validation defaults.
 *
 * These are the policy values the router applies unless a caller or the
 * environment overrides them.
 */

import type { FieldPath, FreeTextFieldPath } from './types';

/** Claims with a damage amount strictly below this go to Fast-track */
export const FAST_TRACK_THRESHOLD = 25000;

export const FRAUD_KEYWORDS: readonly string[] = [
  'fraud',
  'fraudulent',
  'inconsistent',
  'staged',
  'suspicious',
  'fabricated',
  'false',
];

/** Free-text fields scanned for fraud keywords. Identifiers and names are excluded. */
export const FRAUD_SCAN_FIELDS: readonly FreeTextFieldPath[] = [
  'incidentInformation.description',
  'incidentInformation.location',
];

/** Any of these being absent sends the claim to Manual Review */
export const MANDATORY_FIELDS: readonly FieldPath[] = [
  'policyInformation.policyNumber',
  'policyInformation.policyholderName',
  'incidentInformation.date',
  'incidentInformation.location',
  'involvedParties.claimant',
  'assetDetails.assetType',
  'otherMandatoryFields.claimType',
  'otherMandatoryFields.initialEstimate',
];

export const DEFAULT_DOCUMENTS_DIR = 'fixtures/documents';
export const DEFAULT_OUTPUT_DIR = 'output';
