/**
 * Correlation Context
 *
 * Carries the correlation ID and, inside a pipeline run, the document being
 * extracted. One store spans an API request, a worker job or a pipeline run.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  documentRole?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Correlation ID of the current context. Outside any context a fresh ID is
 * returned on every call.
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/**
 * Run a document-scoped step. Fields the new context leaves out come from the
 * enclosing one.
 */
export function runWithContextAsync<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return storage.run({ ...getContext(), ...context }, fn);
}
