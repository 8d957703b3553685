/**
 * AsyncLocalStorage Context Management
 *
 * Carries the batch correlation ID and the file being processed so that
 * every log line emitted while extracting a statement can be traced back to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RunContext {
  correlationId: string;
  fileName?: string;
  issuer?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context
 */
export function getContext(): RunContext | undefined {
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
 * Generate a new correlation ID for a batch run
 */
export function newCorrelationId(): string {
  return ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RunContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
