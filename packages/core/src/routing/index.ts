export { routeClaim, buildRoutingContext } from './router';
export {
  ROUTING_RULES,
  MISSING_FIELDS_RULE,
  FRAUD_INDICATOR_RULE,
  INJURY_CLAIM_RULE,
  LOW_VALUE_RULE,
  STANDARD_PROCESSING_RULE,
  formatAmount,
  formatThreshold,
  type RoutingRule,
  type RoutingContext,
  type RuleExplanation,
} from './rules';
export { DEFAULT_ROUTING_POLICY, createRoutingPolicy, type RoutingPolicy } from './policy';
export {
  findFraudKeywords,
  getDamageAmount,
  isInjuryClaim,
  type DamageAmount,
  type DamageSource,
} from './signals';
