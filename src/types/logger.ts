/**
 * Logger contract used across the package.
 *
 * Mirrors the subset of Pino's API the components call, so a pino logger can
 * be passed straight in and tests can hand over a recording mock.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): Logger;
}
