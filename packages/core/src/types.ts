/**
 * Claim Record Types
 *
 * Data model shared by the field extractors and the routing engine.
 * Every extractable leaf is a Field<T>: either a concrete value or an
 * explicit absence. Empty strings and zero are never used as sentinels.
 */

// ============================================================================
// Field presence
// ============================================================================

export type Field<T> =
  | { readonly status: 'present'; readonly value: T }
  | { readonly status: 'absent' };

export function present<T>(value: T): Field<T> {
  return { status: 'present', value };
}

/** Field<never> is assignable to every Field<T> */
export function absent(): Field<never> {
  return { status: 'absent' };
}

export function isPresent<T>(field: Field<T>): field is { readonly status: 'present'; readonly value: T } {
  return field.status === 'present';
}

/**
 * Unwrap a field to its value, or null when absent.
 */
export function fieldValue<T>(field: Field<T>): T | null {
  return field.status === 'present' ? field.value : null;
}

// ============================================================================
// Claim record
// ============================================================================

/** Canonical YYYY-MM-DD date string */
export type IsoDate = string;

export type ClaimType = 'auto' | 'injury' | 'property' | 'unknown';

export interface EffectiveDates {
  readonly start: Field<IsoDate>;
  readonly end: Field<IsoDate>;
}

export interface PolicyInformation {
  readonly policyNumber: Field<string>;
  readonly policyholderName: Field<string>;
  readonly effectiveDates: EffectiveDates;
}

export interface IncidentInformation {
  readonly date: Field<IsoDate>;
  readonly time: Field<string>;
  readonly location: Field<string>;
  readonly description: Field<string>;
}

export interface ContactDetails {
  readonly phone: Field<string>;
  readonly email: Field<string>;
}

export interface InvolvedParties {
  readonly claimant: Field<string>;
  readonly thirdParties: Field<readonly string[]>;
  readonly contactDetails: ContactDetails;
}

export interface AssetDetails {
  readonly assetType: Field<string>;
  readonly assetId: Field<string>;
  readonly estimatedDamage: Field<number>;
}

export interface OtherMandatoryFields {
  readonly claimType: Field<ClaimType>;
  readonly attachments: Field<readonly string[]>;
  readonly initialEstimate: Field<number>;
}

export interface ExtractedFields {
  readonly policyInformation: PolicyInformation;
  readonly incidentInformation: IncidentInformation;
  readonly involvedParties: InvolvedParties;
  readonly assetDetails: AssetDetails;
  readonly otherMandatoryFields: OtherMandatoryFields;
}

export interface ClaimRecord extends ExtractedFields {
  /** Mandatory field paths whose value is absent, in checklist order */
  readonly missingFields: readonly FieldPath[];
}

/**
 * Value type of every leaf, keyed by its stable dotted path.
 */
export interface FieldValueMap {
  'policyInformation.policyNumber': string;
  'policyInformation.policyholderName': string;
  'policyInformation.effectiveDates.start': IsoDate;
  'policyInformation.effectiveDates.end': IsoDate;
  'incidentInformation.date': IsoDate;
  'incidentInformation.time': string;
  'incidentInformation.location': string;
  'incidentInformation.description': string;
  'involvedParties.claimant': string;
  'involvedParties.thirdParties': readonly string[];
  'involvedParties.contactDetails.phone': string;
  'involvedParties.contactDetails.email': string;
  'assetDetails.assetType': string;
  'assetDetails.assetId': string;
  'assetDetails.estimatedDamage': number;
  'otherMandatoryFields.claimType': ClaimType;
  'otherMandatoryFields.attachments': readonly string[];
  'otherMandatoryFields.initialEstimate': number;
}

export type FieldPath = keyof FieldValueMap;

/** Fields whose text may be scanned for fraud keywords */
export type FreeTextFieldPath =
  | 'incidentInformation.description'
  | 'incidentInformation.location';

// ============================================================================
// Routing
// ============================================================================

export const ROUTES = {
  MANUAL_REVIEW: 'Manual Review',
  INVESTIGATION_FLAG: 'Investigation Flag',
  SPECIALIST_QUEUE: 'Specialist Queue',
  FAST_TRACK: 'Fast-track',
  STANDARD_PROCESSING: 'Standard Processing',
} as const;

export type Route = (typeof ROUTES)[keyof typeof ROUTES];

export type RoutingRuleId =
  | 'missing_fields'
  | 'fraud_indicator'
  | 'injury_claim'
  | 'low_value'
  | 'standard';

export interface FraudKeywordHit {
  field: FreeTextFieldPath;
  keyword: string;
}

export interface RoutingEvidence {
  missingFields?: readonly FieldPath[];
  fraudHits?: readonly FraudKeywordHit[];
  claimType?: ClaimType;
  damageAmount?: number;
  threshold?: number;
}

export interface RoutingResult {
  recommendedRoute: Route;
  reasoning: string;
  missingFields: readonly FieldPath[];
  /** The rule that produced the route */
  ruleId: RoutingRuleId;
  flags: string[];
  evidence: RoutingEvidence;
}

// ============================================================================
// Output boundary
// ============================================================================

/** ExtractedFields with absent leaves rendered as null */
export interface ExtractedFieldsJson {
  policyInformation: {
    policyNumber: string | null;
    policyholderName: string | null;
    effectiveDates: { start: string | null; end: string | null };
  };
  incidentInformation: {
    date: string | null;
    time: string | null;
    location: string | null;
    description: string | null;
  };
  involvedParties: {
    claimant: string | null;
    thirdParties: string[] | null;
    contactDetails: { phone: string | null; email: string | null };
  };
  assetDetails: {
    assetType: string | null;
    assetId: string | null;
    estimatedDamage: number | null;
  };
  otherMandatoryFields: {
    claimType: ClaimType | null;
    attachments: string[] | null;
    initialEstimate: number | null;
  };
}

export interface ClaimResult {
  extractedFields: ExtractedFieldsJson;
  missingFields: FieldPath[];
  recommendedRoute: Route;
  reasoning: string;
}
