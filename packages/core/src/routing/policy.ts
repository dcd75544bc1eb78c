/**
 * Routing Policy
 *
 * The values the routing rules are evaluated against. Defaults come from
 * config (which reads environment overrides); callers and tests can build
 * alternate policies without touching rule logic.
 */

import { config } from '../config';
import { FRAUD_SCAN_FIELDS, MANDATORY_FIELDS } from '../constants';
import type { FieldPath, FreeTextFieldPath } from '../types';

export interface RoutingPolicy {
  /** Damage amounts strictly below this qualify for Fast-track */
  readonly fastTrackThreshold: number;
  /** Lowercase substrings that raise a fraud signal */
  readonly fraudKeywords: readonly string[];
  /** Free-text fields the fraud scan reads */
  readonly fraudScanFields: readonly FreeTextFieldPath[];
  /** Checklist used to derive missingFields during extraction */
  readonly mandatoryFields: readonly FieldPath[];
}

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = Object.freeze({
  fastTrackThreshold: config.fastTrackThreshold,
  fraudKeywords: Object.freeze([...config.fraudKeywords]),
  fraudScanFields: FRAUD_SCAN_FIELDS,
  mandatoryFields: MANDATORY_FIELDS,
});

/**
 * Build a policy from the defaults with some values replaced.
 * Keywords are lowercased so matching stays case-insensitive.
 */
export function createRoutingPolicy(overrides: Partial<RoutingPolicy> = {}): RoutingPolicy {
  const merged = { ...DEFAULT_ROUTING_POLICY, ...overrides };
  return Object.freeze({
    ...merged,
    fraudKeywords: Object.freeze(merged.fraudKeywords.map((keyword) => keyword.toLowerCase())),
  });
}
