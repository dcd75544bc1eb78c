/**
 * Readable claim summary for the terminal.
 */

import { formatAmount, type ClaimResult } from '@claim-triage/core';

const RULE = '='.repeat(60);

function orNA(value: string | null): string {
  return value ?? 'N/A';
}

export function formatReport(result: ClaimResult, title = 'PROCESSING RESULT'): string {
  const { policyInformation, incidentInformation, assetDetails, otherMandatoryFields } =
    result.extractedFields;

  const lines = [
    RULE,
    title,
    RULE,
    '',
    `Recommended Route: ${result.recommendedRoute}`,
    '',
    'Reasoning:',
    result.reasoning,
    '',
    result.missingFields.length > 0
      ? `Missing Fields: ${result.missingFields.join(', ')}`
      : 'All mandatory fields present',
    '',
    'Extracted Fields Summary:',
    `  Policy: ${orNA(policyInformation.policyNumber)}`,
    `  Policyholder: ${orNA(policyInformation.policyholderName)}`,
    `  Incident Date: ${orNA(incidentInformation.date)}`,
    `  Location: ${orNA(incidentInformation.location)}`,
    `  Estimated Damage: ${
      assetDetails.estimatedDamage === null ? 'N/A' : formatAmount(assetDetails.estimatedDamage)
    }`,
    `  Initial Estimate: ${
      otherMandatoryFields.initialEstimate === null
        ? 'N/A'
        : formatAmount(otherMandatoryFields.initialEstimate)
    }`,
    `  Claim Type: ${orNA(otherMandatoryFields.claimType)}`,
    RULE,
  ];

  return lines.join('\n');
}
