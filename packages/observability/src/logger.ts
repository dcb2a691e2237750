import { createLogger as createBaseLogger } from '@inferlab/shared-utils';

export interface ServiceLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: unknown, meta?: Record<string, unknown>) => void;
  child: (context: Record<string, unknown>) => ServiceLogger;
}

export function createServiceLogger(service: string, context?: Record<string, unknown>): ServiceLogger {
  const baseLogger = createBaseLogger(service);

  const enrich = (meta?: Record<string, unknown>) => ({
    ...context,
    ...meta,
    pid: process.pid,
  });

  return {
    info: (message, meta) => {
      baseLogger.info(message, enrich(meta));
    },
    warn: (message, meta) => {
      baseLogger.warn(message, enrich(meta));
    },
    debug: (message, meta) => {
      baseLogger.debug(message, enrich(meta));
    },
    error: (message, error, meta) => {
      baseLogger.error(message, error, enrich(meta));
    },
    child: childContext => createServiceLogger(service, { ...context, ...childContext }),
  };
}
