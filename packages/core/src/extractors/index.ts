/**
 * Field Extractors Module
 *
 * One extractor per claim record leaf, registered by dotted path.
 *
 * Strategies:
 * - 'labeled_line': most fields
 * - 'labeled_block': incident description
 * - 'labeled_list': third parties, attachments
 * - 'date_range': policy effective dates
 */

// Core types and interfaces
export type {
  FieldExtractor,
  AnyFieldExtractor,
  ExtractionStrategy,
  LabeledFieldOptions,
  ValueParser,
} from './types';

// Base classes
export {
  BaseFieldExtractor,
  LabeledLineExtractor,
  LabeledBlockExtractor,
  LabeledListExtractor,
  DateRangeExtractor,
  type DateRangeOptions,
} from './base-extractor';

// Registry
export {
  registerFieldExtractor,
  getFieldExtractor,
  getFieldExtractorOrThrow,
  getRegisteredFieldPaths,
  getAllFieldExtractors,
  clearFieldRegistry,
  getRegistryStats,
} from './registry';

// Patterns and parsers
export { labeledLinePattern, normalizeDocumentText } from './patterns';
export {
  collapseWhitespace,
  parseAmount,
  parseAssetId,
  parseClaimType,
  parseDate,
  parseEmail,
  parseFreeText,
  parsePersonName,
  parsePhone,
  parsePolicyNumber,
  parseTime,
  splitList,
} from './parsers';

// Individual extractors
export * from './policy';
export * from './incident';
export * from './parties';
export * from './asset';
export * from './claim';

// Import for registration
import type { AnyFieldExtractor } from './types';
import { clearFieldRegistry, registerFieldExtractor } from './registry';
import {
  policyNumberExtractor,
  policyholderNameExtractor,
  effectiveStartExtractor,
  effectiveEndExtractor,
} from './policy';
import {
  incidentDateExtractor,
  incidentTimeExtractor,
  incidentLocationExtractor,
  incidentDescriptionExtractor,
} from './incident';
import { claimantExtractor, thirdPartiesExtractor, phoneExtractor, emailExtractor } from './parties';
import { assetTypeExtractor, assetIdExtractor, estimatedDamageExtractor } from './asset';
import { claimTypeExtractor, attachmentsExtractor, initialEstimateExtractor } from './claim';

export const BUILT_IN_FIELD_EXTRACTORS: readonly AnyFieldExtractor[] = [
  policyNumberExtractor,
  policyholderNameExtractor,
  effectiveStartExtractor,
  effectiveEndExtractor,
  incidentDateExtractor,
  incidentTimeExtractor,
  incidentLocationExtractor,
  incidentDescriptionExtractor,
  claimantExtractor,
  thirdPartiesExtractor,
  phoneExtractor,
  emailExtractor,
  assetTypeExtractor,
  assetIdExtractor,
  estimatedDamageExtractor,
  claimTypeExtractor,
  attachmentsExtractor,
  initialEstimateExtractor,
];

/**
 * Register all built-in extractors.
 */
export function registerBuiltInFieldExtractors(): void {
  for (const extractor of BUILT_IN_FIELD_EXTRACTORS) {
    registerFieldExtractor(extractor);
  }
}

/**
 * Drop custom registrations and restore the built-in extractors.
 */
export function resetFieldExtractors(): void {
  clearFieldRegistry();
  registerBuiltInFieldExtractors();
}

// Auto-register all extractors on module load
registerBuiltInFieldExtractors();
