/**
 * Defines error handling for query execution
 */

/**
 * The categories of failure an execution can report
 */
export type QueryErrorKind =
  | "SyntaxError"
  | "ConstraintViolation"
  | "ConnectionError"
  | "EngineError"

/**
 * The rule a {@link ConstraintViolation} broke
 */
export type ViolationKind =
  | "not_null"
  | "unique"
  | "foreign_key"
  | "check"
  | "exclusion"
  | "check_option"
  | "integrity"

/**
 * Extension of {@link ErrorOptions} for query execution
 */
export interface QueryErrorOptions extends ErrorOptions {
  /** The engine's error code (SQLSTATE or socket code) when there is one */
  code?: string
}

/**
 * Represents an error that occurred while executing SQL. The message is the
 * engine's message, unchanged.
 */
export abstract class QueryError extends Error {
  abstract readonly kind: QueryErrorKind
  readonly code?: string

  constructor(message: string, options?: QueryErrorOptions) {
    super(message, options)
    this.code = options?.code
  }
}

/**
 * The engine could not parse the statement
 */
export class SqlSyntaxError extends QueryError {
  readonly kind = "SyntaxError"
  override readonly name = "SqlSyntaxError"
}

/**
 * The engine rejected data that breaks a declared rule
 */
export class ConstraintViolation extends QueryError {
  readonly kind = "ConstraintViolation"
  override readonly name = "ConstraintViolation"
  readonly violation: ViolationKind
  /** The constraint name when the engine reports it */
  readonly constraint?: string

  constructor(
    message: string,
    violation: ViolationKind,
    options?: QueryErrorOptions & { constraint?: string },
  ) {
    super(message, options)
    this.violation = violation
    this.constraint = options?.constraint
  }
}

/**
 * The engine cannot be reached or dropped the connection
 */
export class ConnectionError extends QueryError {
  readonly kind = "ConnectionError"
  override readonly name = "ConnectionError"
}

/**
 * Any other failure reported by the engine
 */
export class EngineError extends QueryError {
  readonly kind = "EngineError"
  override readonly name = "EngineError"
}

/**
 * Type guard for {@link QueryError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link QueryError}
 */
export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError
}

/**
 * Type guard for {@link ConnectionError}
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError
}

/**
 * Type guard for {@link ConstraintViolation}
 */
export function isConstraintViolation(
  error: unknown,
): error is ConstraintViolation {
  return error instanceof ConstraintViolation
}
