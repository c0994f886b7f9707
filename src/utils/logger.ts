export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export function createLogger(prefix: string): Logger {
  return {
    error: (msg, ctx) => console.error(`[${prefix}] ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`[${prefix}] ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`[${prefix}] ${msg}`, ctx || ''),
  };
}

export const defaultLogger: Logger = createLogger('Evaluate');
