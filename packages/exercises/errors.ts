/**
 * Errors raised by the exercise harness itself
 */

import type { ExecutionResult } from "./types.js"

/**
 * A check observed something other than what it expected
 */
export class AssertionFailure extends Error {
  override readonly name = "AssertionFailure"
}

/**
 * The requested exercise is not in the catalog
 */
export class NotFoundError extends Error {
  override readonly name = "NotFoundError"
  readonly exerciseName: string

  constructor(exerciseName: string) {
    super(`no exercise named ${exerciseName}`)
    this.exerciseName = exerciseName
  }
}

/**
 * The catalog files are missing or invalid
 */
export class CatalogError extends Error {
  override readonly name = "CatalogError"
}

/**
 * The run stopped before every exercise was executed
 */
export class RunAbortedError extends Error {
  override readonly name = "RunAbortedError"
  /** The results of the exercises that completed */
  readonly results: readonly ExecutionResult[]

  constructor(
    message: string,
    results: readonly ExecutionResult[],
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.results = results
  }
}
