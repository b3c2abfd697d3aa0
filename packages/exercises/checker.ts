/**
 * Runs one exercise in its own sandbox and evaluates its checks
 */

import { describeError } from "../core/errors.js"
import { DefaultLogger, type Logger } from "../core/logging.js"
import { Timer } from "../core/time.js"
import {
  isConnectionError,
  isConstraintViolation,
  isQueryError,
  type QueryError,
} from "../query/error.js"
import type { RowSet, Sandbox, SqlEngine } from "../query/index.js"
import {
  diffSchemaObjects,
  normalizeExpression,
  type SchemaDelta,
  type SchemaObject,
} from "../query/inspector.js"
import { formatRows, formatValue, rowsEqual, valuesEqual } from "./comparison.js"
import { AssertionFailure } from "./errors.js"
import type {
  Check,
  CheckOutcome,
  ConstraintCheck,
  ErrorPhase,
  Exercise,
  ExecutionResult,
  IndexCheck,
  RejectsCheck,
  RoutineCheck,
  TriggerCheck,
  ViewCheck,
} from "./types.js"

const EMPTY_DELTA: SchemaDelta = { added: [], removed: [] }

/**
 * Everything a check can look at
 */
interface CheckContext {
  readonly schema: string
  /** The row set returned by the exercise SQL */
  readonly result: RowSet
}

export interface AssertionCheckerOptions {
  logger?: Logger
}

const sameList = (
  actual: readonly string[],
  expected: readonly string[],
): boolean =>
  actual.length === expected.length &&
  actual.every((value, idx) => value === expected[idx])

const sameSet = (
  actual: readonly string[],
  expected: readonly string[],
): boolean => sameList([...actual].sort(), [...expected].sort())

const listOf = (values: readonly string[]): string => `(${values.join(", ")})`

/**
 * Executes an exercise against a fresh sandbox and verifies the observed
 * effects. Only a {@link ConnectionError} escapes {@link check}; every other
 * failure is recorded on the {@link ExecutionResult}.
 */
export class AssertionChecker {
  readonly #engine: SqlEngine
  readonly #logger: Logger

  constructor(engine: SqlEngine, options?: AssertionCheckerOptions) {
    this.#engine = engine
    this.#logger = options?.logger ?? new DefaultLogger({ name: "checker" })
  }

  /**
   * Run the exercise and its checks
   *
   * @param exercise The {@link Exercise} to run
   * @returns The {@link ExecutionResult}
   * @throws {@link ConnectionError} if the engine becomes unreachable
   */
  async check(exercise: Exercise): Promise<ExecutionResult> {
    const timer = Timer.startNew()

    let sandbox: Sandbox
    try {
      sandbox = await this.#engine.createSandbox(exercise.name)
    } catch (err) {
      return this.#errored(exercise, "sandbox", err, EMPTY_DELTA)
    }

    let result: ExecutionResult
    try {
      result = await this.#checkInSandbox(exercise, sandbox.schema)
    } finally {
      await this.#dispose(sandbox)
    }

    this.#logger.info(
      `${exercise.name}: ${result.status} after ${timer.stop()}`,
    )
    return result
  }

  async #dispose(sandbox: Sandbox): Promise<void> {
    try {
      await sandbox.dispose()
    } catch (err) {
      if (isConnectionError(err)) {
        throw err
      }

      this.#logger.error(`failed to drop sandbox ${sandbox.schema}`, err)
    }
  }

  async #checkInSandbox(
    exercise: Exercise,
    schema: string,
  ): Promise<ExecutionResult> {
    const inspector = this.#engine.inspector

    if (exercise.setup !== undefined) {
      try {
        await this.#engine.run(exercise.setup)
      } catch (err) {
        await this.#rollback(err)
        return this.#errored(exercise, "setup", err, EMPTY_DELTA)
      }
    }

    let before: SchemaObject[]
    try {
      before = await inspector.listObjects(schema)
    } catch (err) {
      await this.#rollback(err)
      return this.#errored(exercise, "inspect", err, EMPTY_DELTA)
    }

    let result: RowSet
    try {
      result = await this.#engine.run(exercise.sql)
    } catch (err) {
      await this.#rollback(err)
      let delta = EMPTY_DELTA
      try {
        delta = diffSchemaObjects(before, await inspector.listObjects(schema))
      } catch (inspectErr) {
        if (isConnectionError(inspectErr)) {
          throw inspectErr
        }

        this.#logger.warn(`could not inspect ${schema}`, inspectErr)
      }
      return this.#errored(exercise, "exercise", err, delta)
    }

    let delta: SchemaDelta
    try {
      delta = diffSchemaObjects(before, await inspector.listObjects(schema))
    } catch (err) {
      await this.#rollback(err)
      return this.#errored(exercise, "inspect", err, EMPTY_DELTA)
    }
    this.#logger.debug(
      `${exercise.name} added ${delta.added.length} and removed ${delta.removed.length} objects`,
    )

    const outcomes: CheckOutcome[] = []
    for (const check of exercise.checks) {
      outcomes.push(await this.#evaluate(check, { schema, result }))
    }

    const success = outcomes.every((o) => o.passed)
    return {
      exerciseName: exercise.name,
      category: exercise.category,
      success,
      status: success ? "pass" : "fail",
      checks: outcomes,
      observedSchemaDelta: delta,
    }
  }

  /**
   * Return the session to a usable state after a failed statement, which may
   * have left a transaction aborted
   *
   * @param cause The failure that triggered the rollback
   */
  async #rollback(cause: unknown): Promise<void> {
    if (isConnectionError(cause)) {
      throw cause
    }

    try {
      await this.#engine.rollback()
    } catch (err) {
      if (isConnectionError(err)) {
        throw err
      }

      this.#logger.warn("rollback failed", err)
    }
  }

  #errored(
    exercise: Exercise,
    phase: ErrorPhase,
    err: unknown,
    delta: SchemaDelta,
  ): ExecutionResult {
    if (isConnectionError(err)) {
      throw err
    }

    this.#logger.debug(`${exercise.name} failed during ${phase}`, err)
    return {
      exerciseName: exercise.name,
      category: exercise.category,
      success: false,
      status: "error",
      errorKind: isQueryError(err) ? err.kind : undefined,
      errorPhase: phase,
      errorMessage: describeError(err),
      checks: [],
      observedSchemaDelta: delta,
    }
  }

  async #evaluate(check: Check, context: CheckContext): Promise<CheckOutcome> {
    const outcome = { description: check.description, kind: check.kind }

    try {
      await this.#assert(check, context)
      this.#logger.debug(`check passed: ${check.description}`)
      return { ...outcome, passed: true }
    } catch (err) {
      if (isQueryError(err)) {
        await this.#rollback(err)
      }

      const message =
        err instanceof AssertionFailure
          ? err.message
          : isQueryError(err)
            ? `${err.kind}: ${err.message}`
            : describeError(err)
      this.#logger.debug(`check failed: ${check.description}: ${message}`)
      return { ...outcome, passed: false, message }
    }
  }

  /**
   * Verify a single check
   *
   * @throws {@link AssertionFailure} when the observation does not match
   */
  async #assert(check: Check, context: CheckContext): Promise<void> {
    switch (check.kind) {
      case "accepts":
        await this.#engine.run(check.sql)
        return
      case "rejects":
        return this.#assertRejects(check)
      case "rows": {
        const { rows } = await this.#engine.run(check.sql)
        if (!rowsEqual(rows, check.expected, check.ordered)) {
          throw new AssertionFailure(
            `expected ${formatRows(check.expected)}${check.ordered ? " in order" : ""}, got ${formatRows(rows)}`,
          )
        }
        return
      }
      case "scalar": {
        const { rows } = await this.#engine.run(check.sql)
        if (rows.length === 0) {
          throw new AssertionFailure("query returned no rows")
        }

        const actual = rows[0][0] ?? null
        if (!valuesEqual(actual, check.expected)) {
          throw new AssertionFailure(
            `expected ${formatValue(check.expected)}, got ${formatValue(actual)}`,
          )
        }
        return
      }
      case "result": {
        const { columns, rows } = context.result
        if (check.columns !== undefined && !sameList(columns, check.columns)) {
          throw new AssertionFailure(
            `expected columns ${listOf(check.columns)}, got ${listOf(columns)}`,
          )
        }

        if (!rowsEqual(rows, check.expected, check.ordered)) {
          throw new AssertionFailure(
            `expected ${formatRows(check.expected)}${check.ordered ? " in order" : ""}, got ${formatRows(rows)}`,
          )
        }
        return
      }
      case "index":
        return this.#assertIndex(check, context.schema)
      case "constraint":
        return this.#assertConstraint(check, context.schema)
      case "view":
        return this.#assertView(check, context.schema)
      case "trigger":
        return this.#assertTrigger(check, context.schema)
      case "routine":
        return this.#assertRoutine(check, context.schema)
    }
  }

  async #assertRejects(check: RejectsCheck): Promise<void> {
    let failure: QueryError | undefined
    try {
      await this.#engine.run(check.sql)
    } catch (err) {
      if (!isQueryError(err)) {
        throw err
      }
      failure = err
      await this.#rollback(err)
    }

    if (failure === undefined) {
      throw new AssertionFailure(
        "statement succeeded, expected a constraint violation",
      )
    }

    if (!isConstraintViolation(failure)) {
      throw new AssertionFailure(
        `expected a constraint violation, got ${failure.kind}: ${failure.message}`,
      )
    }

    if (check.violation !== undefined && failure.violation !== check.violation) {
      throw new AssertionFailure(
        `expected a ${check.violation} violation, got ${failure.violation}: ${failure.message}`,
      )
    }
  }

  async #assertIndex(check: IndexCheck, schema: string): Promise<void> {
    const indexes = await this.#engine.inspector.listIndexes(
      schema,
      check.table,
    )
    const candidates =
      check.index === undefined
        ? indexes
        : indexes.filter((i) => i.name === check.index)

    if (check.index !== undefined && candidates.length === 0) {
      throw new AssertionFailure(
        `no index named ${check.index} on ${check.table}`,
      )
    }

    const expected = check.columns.map(normalizeExpression)
    if (
      !candidates.some((i) =>
        sameList(i.columns.map(normalizeExpression), expected),
      )
    ) {
      const found = candidates
        .map((i) => `${i.name} ${listOf(i.columns)}`)
        .join(", ")
      throw new AssertionFailure(
        `no index on ${check.table} ${listOf(expected)}; found ${found || "none"}`,
      )
    }
  }

  async #assertConstraint(
    check: ConstraintCheck,
    schema: string,
  ): Promise<void> {
    const constraints = await this.#engine.inspector.listConstraints(
      schema,
      check.table,
    )

    if (
      !constraints.some(
        (c) => c.type === check.type && sameList(c.columns, check.columns),
      )
    ) {
      const found = constraints
        .map((c) => `${c.type} ${listOf(c.columns)}`)
        .join(", ")
      throw new AssertionFailure(
        `no ${check.type} constraint on ${check.table} ${listOf(check.columns)}; found ${found || "none"}`,
      )
    }
  }

  async #assertView(check: ViewCheck, schema: string): Promise<void> {
    const view = await this.#engine.inspector.describeView(schema, check.view)
    if (view === undefined) {
      throw new AssertionFailure(`view ${check.view} does not exist`)
    }

    if (
      check.checkOption !== undefined &&
      view.checkOption !== check.checkOption
    ) {
      throw new AssertionFailure(
        `expected check option ${check.checkOption}, got ${view.checkOption}`,
      )
    }
  }

  async #assertTrigger(check: TriggerCheck, schema: string): Promise<void> {
    const triggers = await this.#engine.inspector.listTriggers(
      schema,
      check.table,
    )
    const trigger = triggers.find((t) => t.name === check.trigger)
    if (trigger === undefined) {
      throw new AssertionFailure(
        `no trigger named ${check.trigger} on ${check.table}`,
      )
    }

    if (trigger.timing !== check.timing || !sameSet(trigger.events, check.events)) {
      throw new AssertionFailure(
        `expected ${check.timing} ${check.events.join(" OR ")}, got ${trigger.timing} ${trigger.events.join(" OR ")}`,
      )
    }
  }

  async #assertRoutine(check: RoutineCheck, schema: string): Promise<void> {
    const routines = await this.#engine.inspector.listRoutines(schema)
    const matches = routines.filter((r) => r.name === check.routine)

    if (matches.length === 0) {
      throw new AssertionFailure(`no routine named ${check.routine}`)
    }

    if (!matches.some((r) => r.type === check.type)) {
      throw new AssertionFailure(
        `expected ${check.routine} to be a ${check.type}, got ${matches[0].type}`,
      )
    }
  }
}
