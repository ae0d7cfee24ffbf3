import { AsyncLocalStorage } from 'async_hooks';

/**
 * Correlation ids attached to every log line written inside the context:
 * `requestId` for HTTP requests, `cycle` for scheduler scan cycles.
 */
export type LogContext = {
  requestId?: string;
  cycle?: number;
};

const logContextStorage = new AsyncLocalStorage<LogContext>();

export function runWithLogContext<T>(context: LogContext, callback: () => T): T {
  return logContextStorage.run(context, callback);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}
