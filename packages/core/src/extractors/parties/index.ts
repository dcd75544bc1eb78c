/**
 * Involved Parties Extractors
 */

import { LabeledLineExtractor, LabeledListExtractor } from '../base-extractor';
import { parseEmail, parsePersonName, parsePhone, splitList } from '../parsers';

export const claimantExtractor = new LabeledLineExtractor({
  fieldPath: 'involvedParties.claimant',
  description: 'Name of the person making the claim',
  labels: ['Claimant Name', 'Claimant'],
  parse: parsePersonName,
});

export const thirdPartiesExtractor = new LabeledListExtractor({
  fieldPath: 'involvedParties.thirdParties',
  description: 'Other parties involved, in the order listed',
  labels: ['Third[ \\t-]*Part(?:y|ies) Names?', 'Third[ \\t-]*Part(?:y|ies)'],
  parse: splitList,
});

export const phoneExtractor = new LabeledLineExtractor({
  fieldPath: 'involvedParties.contactDetails.phone',
  description: 'Contact phone number',
  labels: ['Contact Phone', 'Contact Number', 'Phone Number', 'Phone', 'Telephone', 'Tel\\.?'],
  parse: parsePhone,
});

export const emailExtractor = new LabeledLineExtractor({
  fieldPath: 'involvedParties.contactDetails.email',
  description: 'Contact email address',
  labels: ['Contact Email', 'E-?mail Address', 'E-?mail'],
  parse: parseEmail,
});
