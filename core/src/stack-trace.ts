/**
 * Stack trace capture for widecol error classes.
 *
 * V8 runtimes (Node.js) expose `Error.captureStackTrace`, which trims the
 * error constructor frames from the recorded stack. Other runtimes keep the
 * stack the `Error` constructor already recorded.
 */

/**
 * Record the stack of `error`, omitting `constructorOpt` and every frame above it.
 *
 * @example
 * ```typescript
 * class TableGoneError extends Error {
 *   constructor(table: string) {
 *     super(`Table ${table} is gone`);
 *     this.name = 'TableGoneError';
 *     captureStackTrace(this, TableGoneError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(error, constructorOpt);
  }
}
