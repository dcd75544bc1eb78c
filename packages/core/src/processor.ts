/**
 * Claim Processor
 *
 * Runs extraction and routing for one document inside a correlation context,
 * with logging, metrics and output validation around the pure core.
 */

import { createContext, runWithContext, type RequestContext } from './context';
import { extractClaim } from './extract-claim';
import { logger } from './logger';
import {
  claimsProcessedCounter,
  extractionDurationHistogram,
  fraudKeywordHitsCounter,
  missingFieldsCounter,
} from './metrics';
import { toExtractedFieldsJson } from './record';
import { DEFAULT_ROUTING_POLICY, routeClaim, type RoutingPolicy } from './routing';
import { validateClaimResult } from './schemas';
import type { ClaimRecord, ClaimResult, RoutingResult } from './types';

export interface ProcessClaimOptions {
  policy?: RoutingPolicy;
  documentId?: string;
  sourceFile?: string;
  correlationId?: string;
}

export interface ProcessedClaim {
  record: ClaimRecord;
  routing: RoutingResult;
  result: ClaimResult;
}

export interface ClaimDocument {
  documentId: string;
  text: string;
  sourceFile?: string;
}

export type BatchOutcome =
  | { status: 'processed'; documentId: string; result: ClaimResult }
  | { status: 'failed'; documentId: string; error: Error };

/**
 * Output structure for one claim. Arrays are copied so the result can be
 * serialized or mutated without touching the frozen record.
 */
export function toClaimResult(record: ClaimRecord, routing: RoutingResult): ClaimResult {
  return {
    extractedFields: toExtractedFieldsJson(record),
    missingFields: [...routing.missingFields],
    recommendedRoute: routing.recommendedRoute,
    reasoning: routing.reasoning,
  };
}

/**
 * Extract and route one document, returning the record and routing detail
 * along with the output structure.
 */
export function processClaim(text: string, options: ProcessClaimOptions = {}): ProcessedClaim {
  const policy = options.policy ?? DEFAULT_ROUTING_POLICY;
  const context: RequestContext = createContext({
    correlationId: options.correlationId,
    documentId: options.documentId,
    sourceFile: options.sourceFile,
  });

  return runWithContext(context, () => {
    const endTimer = extractionDurationHistogram.startTimer();

    try {
      logger.info('Processing claim document', { chars: typeof text === 'string' ? text.length : 0 });

      const record = extractClaim(text, { mandatoryFields: policy.mandatoryFields });
      logger.info('Fields extracted', {
        missing_field_count: record.missingFields.length,
        missing_fields: record.missingFields,
      });

      const routing = routeClaim(record, policy);
      logger.info('Claim routed', {
        route: routing.recommendedRoute,
        rule_id: routing.ruleId,
        flags: routing.flags,
      });

      const result = toClaimResult(record, routing);
      const validation = validateClaimResult(result);
      if (!validation.valid) {
        logger.warn('Claim result does not match output contract', { errors: validation.errors });
      }

      claimsProcessedCounter.inc({ route: routing.recommendedRoute });
      for (const field of record.missingFields) {
        missingFieldsCounter.inc({ field });
      }
      for (const hit of routing.evidence.fraudHits ?? []) {
        fraudKeywordHitsCounter.inc({ keyword: hit.keyword });
      }

      return { record, routing, result };
    } catch (error) {
      logger.error('Claim processing failed', error);
      throw error;
    } finally {
      endTimer();
    }
  });
}

/**
 * Extract and route one document.
 *
 * @throws InvalidClaimInputError when text is not a string
 */
export function processClaimText(text: string, options: ProcessClaimOptions = {}): ClaimResult {
  return processClaim(text, options).result;
}

/**
 * Process documents one at a time. A document that cannot be processed is
 * reported as a failed outcome; the rest of the batch still runs.
 */
export function processClaimBatch(
  documents: readonly ClaimDocument[],
  options: Omit<ProcessClaimOptions, 'documentId' | 'sourceFile' | 'correlationId'> = {}
): BatchOutcome[] {
  return documents.map((document): BatchOutcome => {
    try {
      const result = processClaimText(document.text, {
        ...options,
        documentId: document.documentId,
        sourceFile: document.sourceFile,
      });
      return { status: 'processed', documentId: document.documentId, result };
    } catch (error) {
      return {
        status: 'failed',
        documentId: document.documentId,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  });
}
