/**
 * Shared helpers used across the sql-drill packages
 */

import util from "util"

/** Simple type representing `T | PromiseLike<T>` */
export type MaybeAwaitable<T> = T | PromiseLike<T>

/**
 * Get the information about an object to help with debugging that leverages the
 * `util.inspect` method
 *
 * @param target The target object to inspect
 * @param depth The maximum depth to traverse (default is 4)
 * @returns A single line string representation of the object
 */
export function getDebugInfo(target: unknown, depth = 4): string {
  return util.inspect(target, { depth, colors: false, breakLength: Infinity })
}
