/**
 * Field Extractor Registry
 *
 * Strategy map from a field's dotted path to the extractor that fills it.
 * Registering an extractor for a path replaces the previous one.
 */

import type { FieldPath } from '../types';
import type { AnyFieldExtractor, ExtractionStrategy, FieldExtractor } from './types';
import { logger } from '../logger';

type ExtractorMap = { [P in FieldPath]?: FieldExtractor<P> };

const extractorRegistry: ExtractorMap = {};

/**
 * Register an extractor for its field path.
 * Overwrites any existing extractor for that path.
 */
export function registerFieldExtractor<P extends FieldPath>(extractor: FieldExtractor<P>): void {
  const registry: { [K in P]?: FieldExtractor<K> } = extractorRegistry;
  registry[extractor.fieldPath] = extractor;

  logger.debug('Registered field extractor', {
    field_path: extractor.fieldPath,
    strategy: extractor.strategy,
    description: extractor.description,
  });
}

/**
 * Get the extractor for a field path, or undefined if not registered.
 */
export function getFieldExtractor<P extends FieldPath>(fieldPath: P): FieldExtractor<P> | undefined {
  return extractorRegistry[fieldPath];
}

/**
 * Get the extractor for a field path, throwing if not found.
 *
 * @throws Error if no extractor is registered for that path
 */
export function getFieldExtractorOrThrow<P extends FieldPath>(fieldPath: P): FieldExtractor<P> {
  const extractor = getFieldExtractor(fieldPath);
  if (!extractor) {
    throw new Error(`No extractor registered for field: ${fieldPath}`);
  }
  return extractor;
}

/**
 * Get all registered field paths.
 */
export function getRegisteredFieldPaths(): FieldPath[] {
  return getAllFieldExtractors().map((extractor) => extractor.fieldPath);
}

/**
 * Get all registered extractors.
 */
export function getAllFieldExtractors(): AnyFieldExtractor[] {
  const extractors: AnyFieldExtractor[] = [];
  for (const extractor of Object.values(extractorRegistry)) {
    if (extractor) extractors.push(extractor);
  }
  return extractors;
}

/**
 * Remove all registered extractors.
 */
export function clearFieldRegistry(): void {
  for (const extractor of getAllFieldExtractors()) {
    delete extractorRegistry[extractor.fieldPath];
  }
}

/**
 * Get registry statistics
 */
export function getRegistryStats(): {
  totalExtractors: number;
  byStrategy: Partial<Record<ExtractionStrategy, number>>;
  fieldPaths: FieldPath[];
} {
  const extractors = getAllFieldExtractors();
  const byStrategy: Partial<Record<ExtractionStrategy, number>> = {};

  for (const extractor of extractors) {
    byStrategy[extractor.strategy] = (byStrategy[extractor.strategy] || 0) + 1;
  }

  return {
    totalExtractors: extractors.length,
    byStrategy,
    fieldPaths: getRegisteredFieldPaths(),
  };
}
