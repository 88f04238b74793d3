/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID of an API request, and the batch and document
 * currently being processed, so every log line can be traced back to them.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  batchId?: string;
  /** Filename of the document being processed */
  documentId?: string;
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
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run a function in a child context that inherits the current correlation ID.
 */
export function runInChildContext<T>(overrides: Partial<RequestContext>, fn: () => T): T {
  const parent = getContext();
  return asyncLocalStorage.run(
    {
      ...parent,
      ...overrides,
      correlationId: overrides.correlationId || parent?.correlationId || ulid(),
    },
    fn
  );
}
