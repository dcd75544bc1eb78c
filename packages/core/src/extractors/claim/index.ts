/**
 * Claim-Level Extractors
 *
 * Claim type, attachments and the initial estimate.
 */

import { LabeledLineExtractor, LabeledListExtractor } from '../base-extractor';
import { parseAmount, parseClaimType, splitList } from '../parsers';

export const claimTypeExtractor = new LabeledLineExtractor({
  fieldPath: 'otherMandatoryFields.claimType',
  description: 'Claim category: auto, injury, property, or unknown',
  labels: ['Claim Type'],
  parse: parseClaimType,
});

export const attachmentsExtractor = new LabeledListExtractor({
  fieldPath: 'otherMandatoryFields.attachments',
  description: 'Attached file names',
  labels: ['Attachments?'],
  parse: splitList,
});

export const initialEstimateExtractor = new LabeledLineExtractor({
  fieldPath: 'otherMandatoryFields.initialEstimate',
  description: 'Initial damage estimate with currency formatting removed',
  labels: ['Initial Damage Estimate', 'Initial Estimate'],
  parse: parseAmount,
});
