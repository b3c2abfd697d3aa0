/**
 * Translate `pg` failures into {@link QueryError} kinds
 */

import { describeError, getErrorCode } from "../core/errors.js"
import type { Optional } from "../core/type/utils.js"
import {
  ConnectionError,
  ConstraintViolation,
  EngineError,
  SqlSyntaxError,
  isQueryError,
  type QueryError,
  type ViolationKind,
} from "../query/error.js"

/** SQLSTATE codes that name a specific rule */
const VIOLATIONS: ReadonlyMap<string, ViolationKind> = new Map([
  ["23502", "not_null"],
  ["23503", "foreign_key"],
  ["23505", "unique"],
  ["23514", "check"],
  ["23P01", "exclusion"],
  ["44000", "check_option"],
])

/** Socket level codes raised by node when the server is unreachable */
const SOCKET_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "EPIPE",
  "EAI_AGAIN",
])

/** Messages pg uses when the connection went away without a code */
const LOST_CONNECTION = /connection terminated|not queryable|timeout expired/i

/**
 * Check if the SQLSTATE or socket code means the connection is unusable
 *
 * @param code The code to check
 * @returns True for connection exceptions (08), authorization failures (28),
 * too many connections and server shutdowns
 */
export function isConnectionCode(code: string): boolean {
  return (
    SOCKET_CODES.has(code) ||
    code.startsWith("08") ||
    code.startsWith("28") ||
    code === "53300" ||
    /^57P0[1-3]$/.test(code)
  )
}

function getConstraintName(err: unknown): Optional<string> {
  if (
    typeof err === "object" &&
    err !== null &&
    "constraint" in err &&
    typeof err.constraint === "string"
  ) {
    return err.constraint
  }

  return
}

/**
 * Classify anything thrown while talking to postgres. The engine's message
 * is kept verbatim.
 *
 * @param err The thrown value
 * @returns The matching {@link QueryError}
 */
export function classifyPostgresError(err: unknown): QueryError {
  if (isQueryError(err)) {
    return err
  }

  const message = describeError(err)
  const code = getErrorCode(err)

  if (code === undefined) {
    return LOST_CONNECTION.test(message)
      ? new ConnectionError(message, { cause: err })
      : new EngineError(message, { cause: err })
  }

  const violation = VIOLATIONS.get(code)
  if (violation !== undefined || code.startsWith("23")) {
    return new ConstraintViolation(message, violation ?? "integrity", {
      code,
      cause: err,
      constraint: getConstraintName(err),
    })
  }

  if (code === "42601") {
    return new SqlSyntaxError(message, { code, cause: err })
  }

  if (isConnectionCode(code)) {
    return new ConnectionError(message, { code, cause: err })
  }

  return new EngineError(message, { code, cause: err })
}
