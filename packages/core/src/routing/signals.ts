/**
 * Routing Signals
 *
 * Values derived from a claim record that routing rules test: fraud keyword
 * hits in free text, the claim type, and the damage amount.
 */

import { getField } from '../record';
import { fieldValue, isPresent, type ClaimRecord, type FraudKeywordHit } from '../types';
import type { RoutingPolicy } from './policy';

export type DamageSource = 'assetDetails.estimatedDamage' | 'otherMandatoryFields.initialEstimate';

export interface DamageAmount {
  amount: number;
  source: DamageSource;
}

/**
 * Scan the policy's free-text fields for fraud keywords.
 * Case-insensitive substring match; hits are ordered by field, then keyword.
 */
export function findFraudKeywords(record: ClaimRecord, policy: RoutingPolicy): FraudKeywordHit[] {
  const hits: FraudKeywordHit[] = [];

  for (const fieldPath of policy.fraudScanFields) {
    const text = fieldValue(getField(record, fieldPath));
    if (text === null) continue;

    const haystack = text.toLowerCase();
    for (const keyword of policy.fraudKeywords) {
      if (haystack.includes(keyword.toLowerCase())) {
        hits.push({ field: fieldPath, keyword });
      }
    }
  }

  return hits;
}

/**
 * Damage amount used for the fast-track threshold: the asset's estimated
 * damage, or the claim's initial estimate when that is absent.
 */
export function getDamageAmount(record: ClaimRecord): DamageAmount | null {
  const { estimatedDamage } = record.assetDetails;
  if (isPresent(estimatedDamage)) {
    return { amount: estimatedDamage.value, source: 'assetDetails.estimatedDamage' };
  }

  const { initialEstimate } = record.otherMandatoryFields;
  if (isPresent(initialEstimate)) {
    return { amount: initialEstimate.value, source: 'otherMandatoryFields.initialEstimate' };
  }

  return null;
}

export function isInjuryClaim(record: ClaimRecord): boolean {
  const claimType = fieldValue(record.otherMandatoryFields.claimType);
  return claimType !== null && claimType.trim().toLowerCase() === 'injury';
}
