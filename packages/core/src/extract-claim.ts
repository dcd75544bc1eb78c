/**
 * Claim Extraction
 *
 * Runs every registered field extractor over one document and assembles
 * the claim record. Extraction is total: any string produces a record, with
 * unreadable fields marked absent and listed in missingFields when mandatory.
 */

import { MANDATORY_FIELDS } from './constants';
import { InvalidClaimInputError } from './errors';
import { getFieldExtractorOrThrow, normalizeDocumentText } from './extractors';
import { findMissingFields } from './record';
import type { ClaimRecord, ExtractedFields, Field, FieldPath, FieldValueMap } from './types';

export interface ExtractClaimOptions {
  /** Checklist used to derive missingFields */
  mandatoryFields?: readonly FieldPath[];
}

/**
 * Extract a claim record from plain document text.
 *
 * @throws InvalidClaimInputError when text is not a string
 */
export function extractClaim(
  text: string | null | undefined,
  options: ExtractClaimOptions = {}
): ClaimRecord {
  if (typeof text !== 'string') {
    throw new InvalidClaimInputError('extractClaim expects the document text as a string', text);
  }

  const normalized = normalizeDocumentText(text);
  const field = <P extends FieldPath>(fieldPath: P): Field<FieldValueMap[P]> =>
    getFieldExtractorOrThrow(fieldPath).extract(normalized);

  const fields: ExtractedFields = Object.freeze({
    policyInformation: Object.freeze({
      policyNumber: field('policyInformation.policyNumber'),
      policyholderName: field('policyInformation.policyholderName'),
      effectiveDates: Object.freeze({
        start: field('policyInformation.effectiveDates.start'),
        end: field('policyInformation.effectiveDates.end'),
      }),
    }),
    incidentInformation: Object.freeze({
      date: field('incidentInformation.date'),
      time: field('incidentInformation.time'),
      location: field('incidentInformation.location'),
      description: field('incidentInformation.description'),
    }),
    involvedParties: Object.freeze({
      claimant: field('involvedParties.claimant'),
      thirdParties: field('involvedParties.thirdParties'),
      contactDetails: Object.freeze({
        phone: field('involvedParties.contactDetails.phone'),
        email: field('involvedParties.contactDetails.email'),
      }),
    }),
    assetDetails: Object.freeze({
      assetType: field('assetDetails.assetType'),
      assetId: field('assetDetails.assetId'),
      estimatedDamage: field('assetDetails.estimatedDamage'),
    }),
    otherMandatoryFields: Object.freeze({
      claimType: field('otherMandatoryFields.claimType'),
      attachments: field('otherMandatoryFields.attachments'),
      initialEstimate: field('otherMandatoryFields.initialEstimate'),
    }),
  });

  const missingFields = Object.freeze(
    findMissingFields(fields, options.mandatoryFields ?? MANDATORY_FIELDS)
  );

  return Object.freeze({ ...fields, missingFields });
}
