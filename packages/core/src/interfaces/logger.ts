/**
 * Logger
 * Minimal structured logger injected by the caller
 * Compatible with pino-style loggers through a thin wrapper
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
