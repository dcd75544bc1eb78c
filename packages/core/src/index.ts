/**
 * Claim triage core: field extraction, routing rules and the processor
 * that wraps them with logging, metrics and output validation.
 */

export * from './types';
export * from './errors';
export * from './constants';
export * from './config';
export * from './context';
export * from './logger';
export * from './metrics';
export * from './schemas';
export * from './record';
export * from './extractors';
export * from './extract-claim';
export * from './routing';
export * from './processor';
