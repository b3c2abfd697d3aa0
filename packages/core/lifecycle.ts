/**
 * Process lifecycle hooks
 */

import type { MaybeAwaitable } from "./index.js"
import { error, fatal } from "./logging.js"

/** Set of shutdown hooks to fire on exit */
const shutdownHooks: (() => MaybeAwaitable<unknown>)[] = []

let handlersInstalled = false

/**
 * Register the callback to be invoked on shutdown
 *
 * @param callback The callback to invoke on a shutdown
 */
export function registerShutdown(
  callback: () => MaybeAwaitable<unknown>,
): void {
  shutdownHooks.push(callback)
}

/**
 * Removes the callback if present from the global shutdowns
 *
 * @param callback The callback to remove
 * @returns True if the callback was removed
 */
export function removeShutdown(
  callback: () => MaybeAwaitable<unknown>,
): boolean {
  const idx = shutdownHooks.indexOf(callback)
  if (idx >= 0) {
    shutdownHooks.splice(idx, 1)
    return true
  }

  return false
}

/**
 * Fire every registered hook, waiting for all of them to settle
 */
export async function shutdown(): Promise<void> {
  const results = await Promise.allSettled(
    shutdownHooks.map(async (hook) => await hook()),
  )

  for (const result of results) {
    if (result.status === "rejected") {
      error(`error during shutdown: ${result.reason}`, result.reason)
    }
  }
}

/**
 * Run the shutdown hooks when the process receives SIGINT (ctrl+c) or SIGTERM.
 * Installing more than once has no additional effect.
 */
export function installShutdownHandlers(): void {
  if (handlersInstalled) {
    return
  }

  handlersInstalled = true
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      fatal(`Received ${signal}, shutting down...`)
      shutdown().catch((err: unknown) => {
        error(`shutdown failed: ${err}`, err)
      })
    })
  }
}
