/**
 * Logger contract for the library layers.
 *
 * The CLI passes its BaseCommand, which satisfies this interface; library
 * code defaults to the silent logger so it stays quiet in tests and when
 * embedded.
 *
 * @module logger
 */

export interface Logger {
  /** Detail only shown in verbose mode */
  debug(message: string, ...args: unknown[]): void;
  /** Progress output, hidden in quiet mode */
  info(message: string, ...args: unknown[]): void;
  /** Problems that do not stop the run */
  warn(message: string, ...args: unknown[]): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
