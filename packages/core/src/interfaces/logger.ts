/**
 * Logger Interface
 *
 * The subset of a structured logger the engine facades write to.
 */

export interface ICheckLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
}
