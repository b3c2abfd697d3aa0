/**
 * Sequential execution of a list of exercises on one engine
 */

import { ValueType } from "@opentelemetry/api"
import { DefaultLogger, type Logger } from "../core/logging.js"
import { getDrillMeter } from "../core/observability/metrics.js"
import { isConnectionError } from "../query/error.js"
import type { SqlEngine } from "../query/index.js"
import { AssertionChecker } from "./checker.js"
import { RunAbortedError } from "./errors.js"
import type { Exercise, ExecutionResult } from "./types.js"

export interface ExerciseRunnerOptions {
  logger?: Logger
  /** Stops the run before the next exercise once aborted */
  signal?: AbortSignal
}

/**
 * Runs exercises one at a time, in order, on a single engine connection
 */
export class ExerciseRunner {
  readonly #checker: AssertionChecker
  readonly #logger: Logger
  readonly #signal?: AbortSignal

  constructor(engine: SqlEngine, options?: ExerciseRunnerOptions) {
    this.#logger = options?.logger ?? new DefaultLogger({ name: "runner" })
    this.#checker = new AssertionChecker(engine, { logger: this.#logger })
    this.#signal = options?.signal
  }

  /**
   * Run every exercise in order
   *
   * @param exercises The exercises to run
   * @returns One {@link ExecutionResult} per exercise
   * @throws {@link RunAbortedError} with the completed results when the
   * connection is lost or the signal fires
   */
  async run(exercises: readonly Exercise[]): Promise<ExecutionResult[]> {
    const outcomes = getDrillMeter().createCounter("exercise_outcome", {
      description: "The number of exercises run by outcome",
      valueType: ValueType.INT,
    })

    const signal = this.#signal
    const results: ExecutionResult[] = []
    for (const exercise of exercises) {
      if (signal?.aborted) {
        throw new RunAbortedError(
          `run aborted before ${exercise.name}`,
          results,
          { cause: signal.reason },
        )
      }

      this.#logger.debug(`Running ${exercise.name}`)
      try {
        const result = await this.#checker.check(exercise)
        outcomes.add(1, { "exercise.status": result.status })
        results.push(result)
      } catch (err) {
        if (isConnectionError(err)) {
          this.#logger.error(
            `Lost the connection while running ${exercise.name}`,
            err,
          )
          throw new RunAbortedError(
            `connection lost during ${exercise.name}: ${err.message}`,
            results,
            { cause: err },
          )
        }

        throw err
      }
    }

    return results
  }
}
