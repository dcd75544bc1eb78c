/**
 * Base Field Extractor
 *
 * Abstract base class providing the shared extract() flow, and the concrete
 * label-driven extractors every built-in field is built from.
 */

import { absent, present, type Field, type FieldPath, type FieldValueMap } from '../types';
import { InvalidClaimInputError } from '../errors';
import { logger } from '../logger';
import type { ExtractionStrategy, FieldExtractor, LabeledFieldOptions, ValueParser } from './types';
import {
  LABEL_LINE_PATTERN,
  LIST_ITEM_PATTERN,
  SECTION_HEADING_PATTERN,
  cutAtColumnGap,
  labeledDateRangePattern,
  labeledLinePattern,
  lineIndexAt,
  normalizeDocumentText,
} from './patterns';
import { collapseWhitespace } from './parsers';

/**
 * Abstract base class for field extractors.
 * Validates input, normalizes text and logs the outcome; subclasses
 * implement locate().
 */
export abstract class BaseFieldExtractor<P extends FieldPath> implements FieldExtractor<P> {
  abstract readonly fieldPath: P;
  abstract readonly description: string;
  abstract readonly strategy: ExtractionStrategy;

  extract(text: string): Field<FieldValueMap[P]> {
    if (typeof text !== 'string') {
      throw new InvalidClaimInputError(
        `Field extractor ${this.fieldPath} expects document text`,
        text
      );
    }

    try {
      const result = this.locate(normalizeDocumentText(text));

      logger.debug('Field extraction', {
        field_path: this.fieldPath,
        strategy: this.strategy,
        status: result.status,
      });

      return result;
    } catch (error) {
      logger.error('Field extraction failed', error, {
        field_path: this.fieldPath,
        strategy: this.strategy,
      });
      throw error;
    }
  }

  /**
   * Find and parse the field in normalized text.
   */
  protected abstract locate(text: string): Field<FieldValueMap[P]>;
}

/**
 * Value on the same line as its label. The first occurrence whose value
 * parses wins; later occurrences are ignored.
 */
export class LabeledLineExtractor<P extends FieldPath> extends BaseFieldExtractor<P> {
  readonly fieldPath: P;
  readonly description: string;
  readonly strategy: ExtractionStrategy = 'labeled_line';

  private readonly labels: readonly string[];
  private readonly parse: ValueParser<FieldValueMap[P]>;

  constructor(options: LabeledFieldOptions<P>) {
    super();
    this.fieldPath = options.fieldPath;
    this.description = options.description;
    this.labels = options.labels;
    this.parse = options.parse;
  }

  protected locate(text: string): Field<FieldValueMap[P]> {
    for (const match of text.matchAll(labeledLinePattern(this.labels))) {
      const value = this.parse(cutAtColumnGap(match[1]));
      if (value !== null) {
        return present(value);
      }
    }
    return absent();
  }
}

/**
 * Multi-line value: the rest of the label line plus following lines, up to a
 * blank line, another label, or a section heading. Whitespace is collapsed.
 */
export class LabeledBlockExtractor<P extends FieldPath> extends BaseFieldExtractor<P> {
  readonly fieldPath: P;
  readonly description: string;
  readonly strategy: ExtractionStrategy = 'labeled_block';

  private readonly labels: readonly string[];
  private readonly parse: ValueParser<FieldValueMap[P]>;

  constructor(options: LabeledFieldOptions<P>) {
    super();
    this.fieldPath = options.fieldPath;
    this.description = options.description;
    this.labels = options.labels;
    this.parse = options.parse;
  }

  protected locate(text: string): Field<FieldValueMap[P]> {
    const match = labeledLinePattern(this.labels).exec(text);
    if (!match) return absent();

    const lines = text.split('\n');
    const parts = [match[1].trim()];

    for (let i = lineIndexAt(text, match.index) + 1; i < lines.length; i++) {
      const line = lines[i];
      const hasContent = parts.some((part) => part.length > 0);

      if (line.trim() === '') {
        // The value may start on the line after the label
        if (hasContent) break;
        continue;
      }
      if (LABEL_LINE_PATTERN.test(line) || SECTION_HEADING_PATTERN.test(line)) break;

      parts.push(line.trim());
    }

    const value = this.parse(collapseWhitespace(parts.join(' ')));
    return value === null ? absent() : present(value);
  }
}

/**
 * List under a label: either inline ("Attachments: a.jpg, b.pdf") or as
 * bullet items on the following lines. The parser receives the items joined
 * with ';'. A label with no items is an empty list; only a missing label is
 * an absent field.
 */
export class LabeledListExtractor<P extends FieldPath> extends BaseFieldExtractor<P> {
  readonly fieldPath: P;
  readonly description: string;
  readonly strategy: ExtractionStrategy = 'labeled_list';

  private readonly labels: readonly string[];
  private readonly parse: ValueParser<FieldValueMap[P]>;

  constructor(options: LabeledFieldOptions<P>) {
    super();
    this.fieldPath = options.fieldPath;
    this.description = options.description;
    this.labels = options.labels;
    this.parse = options.parse;
  }

  protected locate(text: string): Field<FieldValueMap[P]> {
    const match = labeledLinePattern(this.labels).exec(text);
    if (!match) return absent();

    const inline = cutAtColumnGap(match[1]);
    const raw = inline.length > 0 ? inline : this.collectListItems(text, match.index).join(';');

    const value = this.parse(raw);
    return value === null ? absent() : present(value);
  }

  private collectListItems(text: string, labelOffset: number): string[] {
    const lines = text.split('\n');
    const items: string[] = [];

    for (let i = lineIndexAt(text, labelOffset) + 1; i < lines.length; i++) {
      const itemMatch = lines[i].match(LIST_ITEM_PATTERN);
      if (!itemMatch) break;
      items.push(collapseWhitespace(itemMatch[1]));
    }

    return items;
  }
}

export interface DateRangeOptions<P extends FieldPath> extends LabeledFieldOptions<P> {
  /** Which end of the range this extractor fills */
  endpoint: 'start' | 'end';
  /** Labels introducing a full range ("Effective Dates: A to B") */
  rangeLabels: readonly string[];
}

/**
 * One end of a date range. A labeled range takes precedence over the
 * dedicated start or end labels.
 */
export class DateRangeExtractor<P extends FieldPath> extends BaseFieldExtractor<P> {
  readonly fieldPath: P;
  readonly description: string;
  readonly strategy: ExtractionStrategy = 'date_range';

  private readonly endpoint: 'start' | 'end';
  private readonly rangeLabels: readonly string[];
  private readonly parse: ValueParser<FieldValueMap[P]>;
  private readonly fallback: LabeledLineExtractor<P>;

  constructor(options: DateRangeOptions<P>) {
    super();
    this.fieldPath = options.fieldPath;
    this.description = options.description;
    this.endpoint = options.endpoint;
    this.rangeLabels = options.rangeLabels;
    this.parse = options.parse;
    this.fallback = new LabeledLineExtractor<P>(options);
  }

  protected locate(text: string): Field<FieldValueMap[P]> {
    for (const match of text.matchAll(labeledDateRangePattern(this.rangeLabels))) {
      const value = this.parse(this.endpoint === 'start' ? match[1] : match[2]);
      if (value !== null) {
        return present(value);
      }
    }
    return this.fallback.extract(text);
  }
}
