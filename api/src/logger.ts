/**
 * Minimal logger shape shared by the core modules. Fastify's `app.log` (pino)
 * satisfies it, so the server passes its own logger down.
 */
export interface Logger {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
}

export const consoleLogger: Logger = {
  info: (obj, msg) => (msg ? console.log(msg, obj) : console.log(obj)),
  warn: (obj, msg) => (msg ? console.warn(msg, obj) : console.warn(obj)),
  error: (obj, msg) => (msg ? console.error(msg, obj) : console.error(obj)),
};
