/**
 * Test Helpers
 *
 * Fixture locations and builders for claim records and FNOL text.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  MANDATORY_FIELDS,
  absent,
  findMissingFields,
  present,
  type ClaimRecord,
  type ExtractedFields,
  type Field,
  type FieldPath,
  type FieldValueMap,
} from '@claim-triage/core';

export const FIXTURES_DIR = path.join(__dirname, '../../fixtures/documents');

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function readFixture(name: string): string {
  return fs.readFileSync(fixturePath(name), 'utf-8');
}

export type FieldValues = { [P in FieldPath]?: FieldValueMap[P] | null };

/** A complete auto claim: every mandatory field present, $15,000 estimate */
export const COMPLETE_CLAIM_VALUES: FieldValues = {
  'policyInformation.policyNumber': 'POL-2024-001234',
  'policyInformation.policyholderName': 'John Doe',
  'incidentInformation.date': '2024-11-15',
  'incidentInformation.location': '123 Main St, Springfield',
  'incidentInformation.description': 'Rear-ended at a stop light.',
  'involvedParties.claimant': 'John Doe',
  'assetDetails.assetType': 'Vehicle',
  'otherMandatoryFields.claimType': 'auto',
  'otherMandatoryFields.initialEstimate': 15000,
};

function field<P extends FieldPath>(values: FieldValues, fieldPath: P): Field<FieldValueMap[P]> {
  const value: FieldValueMap[P] | null | undefined = values[fieldPath];
  if (value === null || value === undefined) return absent();
  return present<FieldValueMap[P]>(value);
}

/**
 * Build a claim record from the complete claim with some values replaced.
 * A null override makes the field absent.
 */
export function makeClaimRecord(overrides: FieldValues = {}): ClaimRecord {
  const values: FieldValues = { ...COMPLETE_CLAIM_VALUES, ...overrides };

  const fields: ExtractedFields = {
    policyInformation: {
      policyNumber: field(values, 'policyInformation.policyNumber'),
      policyholderName: field(values, 'policyInformation.policyholderName'),
      effectiveDates: {
        start: field(values, 'policyInformation.effectiveDates.start'),
        end: field(values, 'policyInformation.effectiveDates.end'),
      },
    },
    incidentInformation: {
      date: field(values, 'incidentInformation.date'),
      time: field(values, 'incidentInformation.time'),
      location: field(values, 'incidentInformation.location'),
      description: field(values, 'incidentInformation.description'),
    },
    involvedParties: {
      claimant: field(values, 'involvedParties.claimant'),
      thirdParties: field(values, 'involvedParties.thirdParties'),
      contactDetails: {
        phone: field(values, 'involvedParties.contactDetails.phone'),
        email: field(values, 'involvedParties.contactDetails.email'),
      },
    },
    assetDetails: {
      assetType: field(values, 'assetDetails.assetType'),
      assetId: field(values, 'assetDetails.assetId'),
      estimatedDamage: field(values, 'assetDetails.estimatedDamage'),
    },
    otherMandatoryFields: {
      claimType: field(values, 'otherMandatoryFields.claimType'),
      attachments: field(values, 'otherMandatoryFields.attachments'),
      initialEstimate: field(values, 'otherMandatoryFields.initialEstimate'),
    },
  };

  return { ...fields, missingFields: findMissingFields(fields, MANDATORY_FIELDS) };
}

/**
 * FNOL text with one "Label: value" line per entry, in order.
 */
export function fnolText(lines: Record<string, string>): string {
  return Object.entries(lines)
    .map(([label, value]) => `${label}: ${value}`)
    .join('\n');
}

/** Labeled lines for a complete claim that routes to Fast-track */
export const COMPLETE_CLAIM_LINES: Record<string, string> = {
  'Policy Number': 'POL-2024-001234',
  'Policyholder Name': 'John Doe',
  'Date of Loss': '2024-11-15',
  Location: '123 Main St, Springfield',
  Description: 'Rear-ended at a stop light.',
  Claimant: 'John Doe',
  'Asset Type': 'Vehicle',
  'Claim Type': 'auto',
  'Initial Estimate': '$15,000',
};
