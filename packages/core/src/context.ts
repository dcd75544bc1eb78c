/**
 * AsyncLocalStorage Context Management
 *
 * Carries a correlation ID and the document being processed so that every
 * log line emitted while handling one claim can be tied back to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  sourceFile?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Create a context for a new document, generating a correlation ID
 * unless one is supplied.
 */
export function createContext(fields: Partial<RequestContext> = {}): RequestContext {
  return {
    ...fields,
    correlationId: fields.correlationId || ulid(),
  };
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
