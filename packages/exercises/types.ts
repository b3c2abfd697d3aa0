/**
 * The exercise model shared by the catalog, checker and reports
 */

import type { QueryErrorKind, ViolationKind } from "../query/error.js"
import type { SqlValue } from "../query/index.js"
import type {
  CheckOption,
  ConstraintType,
  RoutineType,
  SchemaDelta,
  TriggerEvent,
  TriggerTiming,
} from "../query/inspector.js"

/**
 * The kind of SQL artifact an exercise produces
 */
export type ExerciseCategory =
  | "constraint"
  | "index"
  | "procedure"
  | "function"
  | "view"
  | "trigger"
  | "query"

interface CheckBase {
  /** What the check verifies, as printed in reports */
  readonly description: string
}

/** The statement must succeed */
export interface AcceptsCheck extends CheckBase {
  readonly kind: "accepts"
  readonly sql: string
}

/** The statement must fail with a constraint violation */
export interface RejectsCheck extends CheckBase {
  readonly kind: "rejects"
  readonly sql: string
  readonly violation?: ViolationKind
}

/** The query must return the expected rows */
export interface RowsCheck extends CheckBase {
  readonly kind: "rows"
  readonly sql: string
  readonly expected: readonly (readonly SqlValue[])[]
  readonly ordered?: boolean
}

/** The first cell of the query must equal the expected value */
export interface ScalarCheck extends CheckBase {
  readonly kind: "scalar"
  readonly sql: string
  readonly expected: SqlValue
}

/** The rows returned by the exercise SQL itself */
export interface ResultCheck extends CheckBase {
  readonly kind: "result"
  readonly expected: readonly (readonly SqlValue[])[]
  readonly columns?: readonly string[]
  readonly ordered?: boolean
}

export interface IndexCheck extends CheckBase {
  readonly kind: "index"
  readonly table: string
  readonly index?: string
  readonly columns: readonly string[]
}

export interface ConstraintCheck extends CheckBase {
  readonly kind: "constraint"
  readonly table: string
  readonly type: ConstraintType
  readonly columns: readonly string[]
}

export interface ViewCheck extends CheckBase {
  readonly kind: "view"
  readonly view: string
  readonly checkOption?: CheckOption
}

export interface TriggerCheck extends CheckBase {
  readonly kind: "trigger"
  readonly table: string
  readonly trigger: string
  readonly timing: TriggerTiming
  readonly events: readonly TriggerEvent[]
}

export interface RoutineCheck extends CheckBase {
  readonly kind: "routine"
  readonly routine: string
  readonly type: RoutineType
}

/**
 * A single verification run after the exercise SQL
 */
export type Check =
  | AcceptsCheck
  | RejectsCheck
  | RowsCheck
  | ScalarCheck
  | ResultCheck
  | IndexCheck
  | ConstraintCheck
  | ViewCheck
  | TriggerCheck
  | RoutineCheck

export type CheckKind = Check["kind"]

/**
 * A named SQL snippet with the checks that prove it works
 */
export interface Exercise {
  readonly name: string
  readonly category: ExerciseCategory
  /** The SQL text, sent to the engine as is */
  readonly sql: string
  readonly expectedEffect: string
  /** SQL creating the tables and rows the exercise works on */
  readonly setup?: string
  readonly checks: readonly Check[]
  /** The file the SQL was read from, relative to the catalog */
  readonly source?: string
}

export interface CheckOutcome {
  readonly description: string
  readonly kind: CheckKind
  readonly passed: boolean
  /** Why the check failed */
  readonly message?: string
}

export type ExecutionStatus = "pass" | "fail" | "error"

/** Where an exercise error happened */
export type ErrorPhase = "sandbox" | "setup" | "exercise" | "inspect"

/**
 * The outcome of running a single exercise
 */
export interface ExecutionResult {
  readonly exerciseName: string
  readonly category: ExerciseCategory
  /** True when the SQL ran and every check passed */
  readonly success: boolean
  readonly status: ExecutionStatus
  readonly errorKind?: QueryErrorKind
  readonly errorPhase?: ErrorPhase
  readonly errorMessage?: string
  readonly checks: readonly CheckOutcome[]
  readonly observedSchemaDelta: SchemaDelta
}
