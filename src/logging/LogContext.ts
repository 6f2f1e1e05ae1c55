import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  unit: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
