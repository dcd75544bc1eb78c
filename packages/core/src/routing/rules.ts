/**
 * Routing Rules
 *
 * Ordered (predicate, route, reasoning) entries. The router takes the first
 * rule whose predicate holds; adding a rule means adding an entry here.
 */

import { ROUTES, type ClaimRecord, type FraudKeywordHit, type Route, type RoutingEvidence, type RoutingRuleId } from '../types';
import type { RoutingPolicy } from './policy';
import type { DamageAmount, DamageSource } from './signals';

/**
 * Everything a rule may look at, computed once per claim.
 */
export interface RoutingContext {
  record: ClaimRecord;
  policy: RoutingPolicy;
  fraudHits: FraudKeywordHit[];
  damage: DamageAmount | null;
  injuryClaim: boolean;
}

export interface RuleExplanation {
  reasoning: string;
  evidence: RoutingEvidence;
}

export interface RoutingRule {
  readonly id: RoutingRuleId;
  readonly route: Route;
  matches(ctx: RoutingContext): boolean;
  explain(ctx: RoutingContext): RuleExplanation;
}

const usdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const wholeUsdFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 2,
});

export function formatAmount(amount: number): string {
  return usdFormatter.format(amount);
}

export function formatThreshold(amount: number): string {
  return wholeUsdFormatter.format(amount);
}

const DAMAGE_SOURCE_LABELS: Record<DamageSource, string> = {
  'assetDetails.estimatedDamage': 'Estimated damage',
  'otherMandatoryFields.initialEstimate': 'Initial estimate',
};

export const MISSING_FIELDS_RULE: RoutingRule = {
  id: 'missing_fields',
  route: ROUTES.MANUAL_REVIEW,
  matches: (ctx) => ctx.record.missingFields.length > 0,
  explain: (ctx) => ({
    reasoning:
      `Missing mandatory fields: ${ctx.record.missingFields.join(', ')}. ` +
      'Claim requires manual review to complete information.',
    evidence: { missingFields: ctx.record.missingFields },
  }),
};

export const FRAUD_INDICATOR_RULE: RoutingRule = {
  id: 'fraud_indicator',
  route: ROUTES.INVESTIGATION_FLAG,
  matches: (ctx) => ctx.fraudHits.length > 0,
  explain: (ctx) => ({
    reasoning:
      `Potential fraud indicators detected: ${ctx.fraudHits
        .map((hit) => `"${hit.keyword}" in ${hit.field}`)
        .join(', ')}. ` + 'Claim flagged for investigation.',
    evidence: { fraudHits: ctx.fraudHits },
  }),
};

export const INJURY_CLAIM_RULE: RoutingRule = {
  id: 'injury_claim',
  route: ROUTES.SPECIALIST_QUEUE,
  matches: (ctx) => ctx.injuryClaim,
  explain: () => ({
    reasoning:
      "Claim type identified as 'injury'. " +
      'Routing to specialist queue for medical review and assessment.',
    evidence: { claimType: 'injury' },
  }),
};

export const LOW_VALUE_RULE: RoutingRule = {
  id: 'low_value',
  route: ROUTES.FAST_TRACK,
  matches: (ctx) => ctx.damage !== null && ctx.damage.amount < ctx.policy.fastTrackThreshold,
  explain: (ctx) => {
    const threshold = ctx.policy.fastTrackThreshold;
    if (ctx.damage === null) {
      throw new Error('low_value rule explained without a damage amount');
    }
    return {
      reasoning:
        `${DAMAGE_SOURCE_LABELS[ctx.damage.source]} (${formatAmount(ctx.damage.amount)}) ` +
        `is below the ${formatThreshold(threshold)} fast-track threshold. ` +
        'All mandatory fields present. No fraud indicators detected. ' +
        'Eligible for fast-track processing.',
      evidence: { damageAmount: ctx.damage.amount, threshold },
    };
  },
};

export const STANDARD_PROCESSING_RULE: RoutingRule = {
  id: 'standard',
  route: ROUTES.STANDARD_PROCESSING,
  matches: () => true,
  explain: (ctx) => {
    const threshold = ctx.policy.fastTrackThreshold;
    if (ctx.damage === null || ctx.damage.amount < threshold) {
      return {
        reasoning:
          'All mandatory fields present. No special conditions detected. ' +
          'Routing to standard processing workflow.',
        evidence: {},
      };
    }
    return {
      reasoning:
        `${DAMAGE_SOURCE_LABELS[ctx.damage.source]} (${formatAmount(ctx.damage.amount)}) ` +
        `is at or above the ${formatThreshold(threshold)} fast-track threshold. ` +
        'No special conditions detected. Routing to standard processing workflow for full assessment.',
      evidence: { damageAmount: ctx.damage.amount, threshold },
    };
  },
};

/** Highest priority first */
export const ROUTING_RULES: readonly RoutingRule[] = [
  MISSING_FIELDS_RULE,
  FRAUD_INDICATOR_RULE,
  INJURY_CLAIM_RULE,
  LOW_VALUE_RULE,
  STANDARD_PROCESSING_RULE,
];
