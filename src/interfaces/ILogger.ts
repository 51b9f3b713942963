/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so that components can take a
 * logger by injection and tests can pass a stub.
 *
 * @module interfaces/ILogger
 */

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class JobResultStore {
 *   constructor(private readonly log: ILogger) {}
 *
 *   prepare(jobDir: string): void {
 *     this.log.debug('Preparing job record', { jobDir });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   *
   * @param message - Log message
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  /** Log at info level. */
  info(message: string, data?: unknown): void;

  /** Log at warn level. */
  warn(message: string, data?: unknown): void;

  /** Log at error level. */
  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;
}
