/**
 * Claim Router
 *
 * Maps a claim record to exactly one route. Deterministic and free of side
 * effects; the processor does the logging and metrics around it.
 */

import { InvalidClaimInputError } from '../errors';
import type { ClaimRecord, RoutingResult } from '../types';
import { DEFAULT_ROUTING_POLICY, type RoutingPolicy } from './policy';
import { ROUTING_RULES, STANDARD_PROCESSING_RULE, type RoutingContext, type RoutingRule } from './rules';
import { findFraudKeywords, getDamageAmount, isInjuryClaim } from './signals';

export function buildRoutingContext(record: ClaimRecord, policy: RoutingPolicy): RoutingContext {
  return {
    record,
    policy,
    fraudHits: findFraudKeywords(record, policy),
    damage: getDamageAmount(record),
    injuryClaim: isInjuryClaim(record),
  };
}

/**
 * Route a claim.
 *
 * Rules are evaluated in order and the first match decides the route.
 * flags lists every rule whose condition held, so signals shadowed by a
 * higher-priority rule (a fraud keyword on a claim with missing fields)
 * are still visible. A rule list without a match falls back to Standard
 * Processing.
 *
 * @throws InvalidClaimInputError when record is null or undefined
 */
export function routeClaim(
  record: ClaimRecord | null | undefined,
  policy: RoutingPolicy = DEFAULT_ROUTING_POLICY,
  rules: readonly RoutingRule[] = ROUTING_RULES
): RoutingResult {
  if (record === null || record === undefined) {
    throw new InvalidClaimInputError('routeClaim expects a claim record', record);
  }

  const ctx = buildRoutingContext(record, policy);
  const matching = rules.filter((rule) => rule.matches(ctx));
  const winner = matching[0] ?? STANDARD_PROCESSING_RULE;
  const { reasoning, evidence } = winner.explain(ctx);

  const flags = matching
    .filter((rule) => rule.id !== STANDARD_PROCESSING_RULE.id || rule === winner)
    .map((rule) => rule.id);

  return {
    recommendedRoute: winner.route,
    reasoning,
    missingFields: record.missingFields,
    ruleId: winner.id,
    flags: flags.length > 0 ? flags : [winner.id],
    evidence,
  };
}
