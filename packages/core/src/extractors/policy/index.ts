/**
 * Policy Information Extractors
 *
 * Policy number, policyholder, and the policy's effective date range.
 */

import { DateRangeExtractor, LabeledLineExtractor } from '../base-extractor';
import { parseDate, parsePersonName, parsePolicyNumber } from '../parsers';

export const policyNumberExtractor = new LabeledLineExtractor({
  fieldPath: 'policyInformation.policyNumber',
  description: 'Policy number after a "Policy Number", "Policy No." or "Policy #" label',
  labels: ['Policy Number', 'Policy No\\.?', 'Policy[ \\t]*#', 'Policy ID'],
  parse: parsePolicyNumber,
});

export const policyholderNameExtractor = new LabeledLineExtractor({
  fieldPath: 'policyInformation.policyholderName',
  description: 'Name of the insured',
  labels: ['Policy[ \\t]*holder Name', 'Policy[ \\t]*holder', 'Insured Name', 'Named Insured'],
  parse: parsePersonName,
});

const EFFECTIVE_RANGE_LABELS = ['Effective Dates?', 'Policy Period', 'Coverage Period', 'Policy Term'];

export const effectiveStartExtractor = new DateRangeExtractor({
  fieldPath: 'policyInformation.effectiveDates.start',
  description: 'Start of the policy period',
  endpoint: 'start',
  rangeLabels: EFFECTIVE_RANGE_LABELS,
  labels: ['Policy Start Date', 'Effective Date', 'Start Date', 'Inception Date'],
  parse: parseDate,
});

export const effectiveEndExtractor = new DateRangeExtractor({
  fieldPath: 'policyInformation.effectiveDates.end',
  description: 'End of the policy period',
  endpoint: 'end',
  rangeLabels: EFFECTIVE_RANGE_LABELS,
  labels: ['Policy End Date', 'Expiration Date', 'Expiry Date', 'End Date'],
  parse: parseDate,
});
