/**
 * Value Parsers
 *
 * Turn the raw text captured after a label into a typed value.
 * Every parser returns null when the text cannot be read as its type;
 * extractors record null as an absent field, never as a default value.
 */

import { format, isValid, parse } from 'date-fns';
import type { ClaimType, IsoDate } from '../types';
import { DATE_TOKEN_SOURCE } from './patterns';

/** Placeholder values that mean "not provided" */
const NOT_PROVIDED_PATTERN = /^(?:n\/?a|none|nil|not provided|not available|not applicable|tbd|pending|-+|\?+)$/i;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function isPlaceholder(value: string): boolean {
  return NOT_PROVIDED_PATTERN.test(collapseWhitespace(value));
}

// ============================================================================
// Text
// ============================================================================

/**
 * Free text (locations, descriptions, asset types).
 */
export function parseFreeText(raw: string): string | null {
  const text = collapseWhitespace(raw);
  if (text.length === 0 || isPlaceholder(text) || !/[\p{L}\p{N}]/u.test(text)) {
    return null;
  }
  return text;
}

const PERSON_NAME_PATTERN = /^\p{L}[\p{L}.,'’-]*(?: \p{L}[\p{L}.,'’-]*)*$/u;

/**
 * Person name: letters, spaces and the punctuation found in names.
 * A trailing parenthetical ("Jane Roe (driver)") is dropped.
 */
export function parsePersonName(raw: string): string | null {
  const name = collapseWhitespace(raw)
    .replace(/\s*\([^)]*\)$/, '')
    .replace(/[,;:.]+$/, '');

  if (name.length === 0 || name.length > 100 || isPlaceholder(name)) return null;
  if (!PERSON_NAME_PATTERN.test(name)) return null;
  return name;
}

// ============================================================================
// Identifiers
// ============================================================================

const IDENTIFIER_PATTERN = /^[A-Z0-9](?:[A-Z0-9-]*[A-Z0-9])?/i;

/**
 * Policy number: first identifier token, uppercased.
 * Must be at least 3 characters and contain a digit.
 */
export function parsePolicyNumber(raw: string): string | null {
  const match = raw.trim().match(IDENTIFIER_PATTERN);
  if (!match) return null;

  const policyNumber = match[0].toUpperCase();
  if (policyNumber.length < 3 || !/\d/.test(policyNumber)) return null;
  return policyNumber;
}

/**
 * Asset identifier (VIN, serial number), uppercased.
 */
export function parseAssetId(raw: string): string | null {
  const match = raw.trim().match(IDENTIFIER_PATTERN);
  if (!match || match[0].length < 3) return null;
  return match[0].toUpperCase();
}

// ============================================================================
// Contact details
// ============================================================================

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_PATTERN = /\+?[\d(][\d\s().-]{5,}\d/;

export function parseEmail(raw: string): string | null {
  const match = raw.match(EMAIL_PATTERN);
  return match ? match[0].toLowerCase() : null;
}

/**
 * Phone number with 7 to 15 digits, whitespace collapsed.
 */
export function parsePhone(raw: string): string | null {
  const match = raw.match(PHONE_PATTERN);
  if (!match) return null;

  const digitCount = match[0].replace(/\D/g, '').length;
  if (digitCount < 7 || digitCount > 15) return null;
  return collapseWhitespace(match[0]);
}

// ============================================================================
// Numbers
// ============================================================================

// Thousands groups may be separated by commas or spaces ("30,000", "30 000")
const AMOUNT_PATTERN =
  /^(?:USD|US\$|\$|€|£)?[ \t]*(-)?[ \t]*(?:USD|US\$|\$)?[ \t]*(\d{1,3}(?:[, ]\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)(?![\dA-Za-z]|[.,]\d)/i;

/** Text after the number that changes its magnitude ("30k", "2 million", "30 00") */
const AMOUNT_SUFFIX_PATTERN = /^\s*(?:\d|(?:k|m|mm|bn|mil|thousand|million|billion)\b)/i;

/**
 * Monetary amount. Currency symbols and thousands separators are stripped;
 * negative or unreadable amounts yield null, never zero. Text after the
 * number is ignored unless it scales the number.
 */
export function parseAmount(raw: string): number | null {
  const value = raw.trim();
  const match = value.match(AMOUNT_PATTERN);
  if (!match || match[1]) return null;
  if (AMOUNT_SUFFIX_PATTERN.test(value.slice(match[0].length))) return null;

  const digits = match[2].replace(/[, ]/g, '');
  const amount = Number(digits);
  if (!Number.isFinite(amount) || amount < 0) return null;
  return amount;
}

// ============================================================================
// Dates and times
// ============================================================================

const LEADING_DATE_PATTERN = new RegExp(`^\\s*(${DATE_TOKEN_SOURCE})`);

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-M-d',
  'MM/dd/yyyy',
  'M/d/yyyy',
  'MMMM d, yyyy',
  'MMMM d yyyy',
  'MMM d, yyyy',
  'MMM d yyyy',
];

// Only used to fill fields a format leaves out; every format has a full date
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Date in ISO, US or written form, normalized to YYYY-MM-DD.
 * Calendar-invalid dates (2024-02-30) yield null.
 */
export function parseDate(raw: string): IsoDate | null {
  const match = raw.match(LEADING_DATE_PATTERN);
  if (!match) return null;

  const token = collapseWhitespace(match[1]).replace(/^([A-Za-z]{3,9})\./, '$1');

  for (const dateFormat of DATE_FORMATS) {
    const parsed = parse(token, dateFormat, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

const TIME_PATTERN = /^\s*(\d{1,2}):(\d{2})(?::\d{2})?(?:\s*([AaPp])\.?\s*[Mm]\.?)?(?![\d:])/;

/**
 * Time of day, normalized to 24-hour HH:MM.
 */
export function parseTime(raw: string): string | null {
  const match = raw.match(TIME_PATTERN);
  if (!match) return null;

  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = match[3]?.toLowerCase();

  if (minutes > 59) return null;

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    if (meridiem === 'p' && hours !== 12) hours += 12;
    if (meridiem === 'a' && hours === 12) hours = 0;
  } else if (hours > 23) {
    return null;
  }

  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

// ============================================================================
// Categories and lists
// ============================================================================

const CLAIM_TYPE_ALIASES = new Map<string, ClaimType>([
  ['auto', 'auto'],
  ['automobile', 'auto'],
  ['vehicle', 'auto'],
  ['injury', 'injury'],
  ['bodily', 'injury'],
  ['medical', 'injury'],
  ['property', 'property'],
]);

/**
 * Claim type from the words after the label. Any injury word wins
 * ("Bodily Injury", "Auto - Medical"); otherwise the first known category.
 * Words that name no known category are still a stated claim type and map
 * to 'unknown'.
 */
export function parseClaimType(raw: string): ClaimType | null {
  if (isPlaceholder(raw)) return null;
  const words = raw.match(/[A-Za-z]+/g);
  if (!words) return null;

  const types = words.flatMap((word) => {
    const type = CLAIM_TYPE_ALIASES.get(word.toLowerCase());
    return type ? [type] : [];
  });
  if (types.includes('injury')) return 'injury';
  return types[0] ?? 'unknown';
}

const LIST_SEPARATOR = /[,;]|\s+and\s+/i;

/**
 * Split an inline list ("Jane Roe, Sam Poe and Ann Loe").
 * Placeholder entries are dropped, so "None" is an empty list.
 */
export function splitList(raw: string): string[] {
  return raw
    .split(LIST_SEPARATOR)
    .map(collapseWhitespace)
    .filter((item) => item.length > 0 && !isPlaceholder(item));
}
