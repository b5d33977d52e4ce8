import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  correlationId: string;
  /** Set while a queue consumer works on a single ticket */
  ticketId?: string;
  method?: string;
  path?: string;
  ip?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}

/**
 * Runs `fn` inside a fresh context. Queue consumers use this so that log
 * lines written while processing a draft carry the ticket id.
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
