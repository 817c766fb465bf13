/**
 * Host Logging Contract
 *
 * Services never import a logger implementation directly: the Fastify
 * instance hands its pino logger down, jobs and tests inject their own.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  info: (obj: LogContext, msg?: string) => void;
  warn: (obj: LogContext, msg?: string) => void;
  error: (obj: LogContext, msg?: string) => void;
  debug?: (obj: LogContext, msg?: string) => void;
}

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};

export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
};
