import { AsyncLocalStorage } from 'async_hooks';

/**
 * Fields merged into every log line written inside the context: one per
 * HTTP request, one per poller or sweeper cycle
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  /** Receiving address, for poller cycles */
  address?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => asyncLocalStorage.getStore()?.correlationId;

export const getLogContext = (): LogContext | undefined => asyncLocalStorage.getStore();

/**
 * Attach fields learned mid-request (e.g. the authenticated user)
 */
export const addLogContext = (context: Partial<Omit<LogContext, 'correlationId'>>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T =>
  asyncLocalStorage.run(context, fn);
