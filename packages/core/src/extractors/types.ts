/**
 * Field Extractor Types
 *
 * Each leaf of the claim record has its own extractor, registered under the
 * leaf's dotted path. Extractors are independent: one never reads another's
 * result, so adding or replacing a field touches nothing else.
 */

import type { Field, FieldPath, FieldValueMap } from '../types';

/**
 * How an extractor locates its value:
 * - 'labeled_line': value follows a label on the same line
 * - 'labeled_block': value follows a label and may continue over several lines
 * - 'labeled_list': a labeled inline list or a bulleted list under the label
 * - 'date_range': one end of a labeled date range, with dedicated labels as fallback
 */
export type ExtractionStrategy = 'labeled_line' | 'labeled_block' | 'labeled_list' | 'date_range';

/**
 * Interface for field extractors.
 */
export interface FieldExtractor<P extends FieldPath = FieldPath> {
  /** Dotted path of the leaf this extractor fills */
  readonly fieldPath: P;

  /** Human-readable description of what this extractor looks for */
  readonly description: string;

  /** Extraction strategy used by this extractor */
  readonly strategy: ExtractionStrategy;

  /**
   * Extract the field from full document text.
   * Never throws for missing or malformed data; returns an absent field.
   */
  extract(text: string): Field<FieldValueMap[P]>;
}

/**
 * Any registered extractor, correlated with its own path.
 */
export type AnyFieldExtractor = { [P in FieldPath]: FieldExtractor<P> }[FieldPath];

/**
 * Parser from captured raw text to a field value; null means unreadable.
 */
export type ValueParser<T> = (raw: string) => T | null;

export interface LabeledFieldOptions<P extends FieldPath> {
  fieldPath: P;
  description: string;
  /** Label variants, longest first; single spaces match any run of spaces */
  labels: readonly string[];
  parse: ValueParser<FieldValueMap[P]>;
}
