/**
 * FNOL Label Patterns
 *
 * Regular expressions for locating labeled values in text produced from
 * claim notices. PDF-to-text conversion leaves indentation, bullet marks,
 * stray separators and multi-column lines behind, so every label pattern:
 * - is case-insensitive and tolerant of extra spaces inside the label
 * - matches at the start of a line, or after a column gap (3+ spaces or a pipe)
 * - accepts `:`, `=`, `-`, a column gap, or nothing before the value
 * - accepts a single space before a value that starts with a digit, `$`,
 *   an identifier token containing a digit, or a date
 */

/** A value on a multi-column line ends at the next column gap */
const COLUMN_GAP = /[ \t]{3,}|[ \t]*\|[ \t]*/;

const LINE_START = String.raw`(?:^[ \t]*(?:[-*•][ \t]+)?|[ \t]{3,}|\|[ \t]*)`;

/**
 * Date tokens accepted anywhere a date is expected:
 * ISO (2024-11-15), US (11/15/2024), written (November 15, 2024 / Nov. 15 2024)
 */
export const DATE_TOKEN_SOURCE = String.raw`\d{4}-\d{1,2}-\d{1,2}|\d{1,2}\/\d{1,2}\/\d{4}|[A-Za-z]{3,9}\.?[ \t]+\d{1,2},?[ \t]+\d{4}`;

// "Policy Number POL-1", "Incident Date 2024-11-15", "Estimated Damage $500"
const SINGLE_SPACE_VALUE = String.raw`[ \t](?=\$|[A-Za-z0-9-]*\d|${DATE_TOKEN_SOURCE})`;

// Labels ending in '#' or '.' ("Policy #", "Policy No.") need no separator
const SEPARATOR = String.raw`(?:[ \t]*[:=–-][ \t]*|[ \t]{2,}|\t|(?<=[#.])[ \t]*|${SINGLE_SPACE_VALUE}|[ \t]*(?=\n|$))`;

/** Separators between the two dates of a range */
const RANGE_SEPARATOR = String.raw`[ \t]*(?:to|through|thru|until|–|-)[ \t]*`;

/**
 * Lines that look like the start of another labeled field ("Claim Type:")
 * or a section heading ("ASSET DETAILS", "=== Parties ===").
 * Labels carry no digits, so a sentence with a clock time ("at 5:30 pm")
 * is not a label.
 */
export const LABEL_LINE_PATTERN = /^[ \t]*(?:[-*•][ \t]+)?[A-Za-z][A-Za-z #./()&'-]{0,40}:(?!\d)/;
export const SECTION_HEADING_PATTERN = /^[ \t]*(?:[=#*_-]{2,}.*|[A-Z][A-Z &/]{3,}:?)[ \t]*$/;

/** Bulleted or numbered list item; group 1 is the item text */
export const LIST_ITEM_PATTERN = /^[ \t]*(?:[-*•]|\d{1,2}[.)])[ \t]+(.+)$/;

/**
 * Turn a readable label ("Policy Number") into a regex source where each
 * space outside a character class tolerates any run of spaces or tabs.
 */
function labelSource(label: string): string {
  return label.replace(/\[[^\]]*\]| /g, (part) => (part === ' ' ? '[ \\t]+' : part));
}

function labelAlternation(labels: readonly string[]): string {
  return labels.map(labelSource).join('|');
}

/**
 * Build a global, multiline pattern for a labeled value.
 * Group 1 holds everything after the separator up to the end of the line.
 *
 * Labels are tried in order, so list longer variants before their prefixes
 * ("Location of Loss" before "Location").
 */
export function labeledLinePattern(labels: readonly string[]): RegExp {
  return new RegExp(
    `${LINE_START}(?:${labelAlternation(labels)})(?![A-Za-z0-9])${SEPARATOR}([^\\n]*)`,
    'gim'
  );
}

/**
 * Build a pattern for a date range after one of the labels.
 * Groups 1 and 2 hold the start and end date tokens.
 */
export function labeledDateRangePattern(labels: readonly string[]): RegExp {
  return new RegExp(
    `${LINE_START}(?:${labelAlternation(labels)})(?![A-Za-z0-9])${SEPARATOR}(${DATE_TOKEN_SOURCE})${RANGE_SEPARATOR}(${DATE_TOKEN_SOURCE})`,
    'gim'
  );
}

/**
 * Cut a captured value at the first column gap.
 */
export function cutAtColumnGap(value: string): string {
  return value.split(COLUMN_GAP)[0].trim();
}

/**
 * Normalize line endings and the whitespace characters PDF extraction
 * commonly emits (non-breaking and zero-width spaces, form feeds).
 */
export function normalizeDocumentText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\f/g, '\n')
    .replace(/[\u00a0\u2007\u202f]/g, ' ')
    .replace(/[\u200b\ufeff]/g, '');
}

/**
 * Index of the line containing a character offset.
 */
export function lineIndexAt(text: string, offset: number): number {
  let line = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
}
