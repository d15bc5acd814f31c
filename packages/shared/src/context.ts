/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the document being scanned across a CLI run
 * or an API request using Node.js AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  /** Identifier of the roster document being processed (usually its path) */
  documentId?: string;
  /** Human-readable source label, e.g. the PDF file name */
  sourceName?: string;
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
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Build a fresh context for one roster document
 */
export function newDocumentContext(documentId: string, sourceName?: string): RequestContext {
  return { correlationId: ulid(), documentId, sourceName };
}
