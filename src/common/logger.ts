/**
 * Logger contract shared by services.
 *
 * Fastify's pino logger satisfies it directly; processes without Fastify
 * (worker, tests) use the console-backed variant.
 */

export interface Logger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  debug?(obj: object, msg?: string): void;
}

export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.info(`[${tag}] ${msg ?? ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg ?? ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg ?? ''}`, obj),
    debug: (obj, msg) => console.debug(`[${tag}] ${msg ?? ''}`, obj),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
