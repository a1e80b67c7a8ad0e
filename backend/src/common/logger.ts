/**
 * Logger contract
 *
 * Structural subset of pino's logger, so `app.log` can be injected directly.
 * Engine classes fall back to a tagged console logger when none is given.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(`[${tag}] ${msg ?? ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg ?? ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg ?? ''}`, obj),
    debug: () => {},
  };
}
