/**
 * Logger interface for pattern and matcher events.
 * Implement this interface to receive compile and engine logs.
 */
export interface RegexLogger {
  /** Log informational messages (engine failures) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (compilation, variant selection, releases) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Anything output can be pushed onto. A `string[]` qualifies.
 */
export interface Appendable {
  push(...chunks: string[]): unknown;
}
