/**
 * Equality of engine values against the values written in the catalog
 */

import type { SqlRow, SqlValue } from "../query/index.js"

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/

/**
 * Compare a value read from the engine with an expected value. Integers
 * compare equal across `number` and `bigint`, and a `Date` equals its ISO
 * form (or its `YYYY-MM-DD` prefix).
 *
 * @param actual The value the engine returned
 * @param expected The expected value
 * @returns True if the values are the same
 */
export function valuesEqual(actual: SqlValue, expected: SqlValue): boolean {
  if (actual === expected) {
    return true
  }

  if (actual === null || expected === null) {
    return false
  }

  if (typeof actual === "bigint") {
    return bigintMatches(actual, expected)
  }

  if (typeof expected === "bigint") {
    return bigintMatches(expected, actual)
  }

  if (actual instanceof Date) {
    return dateMatches(actual, expected)
  }

  if (expected instanceof Date) {
    return dateMatches(expected, actual)
  }

  if (Array.isArray(actual) && Array.isArray(expected)) {
    return rowsMatch(actual, expected)
  }

  return false
}

function bigintMatches(value: bigint, other: SqlValue): boolean {
  return typeof other === "number" && Number.isInteger(other)
    ? BigInt(other) === value
    : other === value
}

function dateMatches(date: Date, other: SqlValue): boolean {
  if (other instanceof Date) {
    return date.getTime() === other.getTime()
  }

  if (typeof other !== "string" || !ISO_DATE.test(other)) {
    return false
  }

  const iso = date.toISOString()
  return other.length === 10 ? iso.startsWith(other) : iso === other
}

function rowsMatch(actual: SqlRow, expected: SqlRow): boolean {
  return (
    actual.length === expected.length &&
    actual.every((value, idx) => valuesEqual(value, expected[idx]))
  )
}

/**
 * Compare row sets. Without `ordered` the rows are treated as a multiset, so
 * duplicates must appear the same number of times.
 *
 * @param actual The rows the engine returned
 * @param expected The expected rows
 * @param ordered True if the order of the rows matters
 * @returns True if the row sets match
 */
export function rowsEqual(
  actual: readonly SqlRow[],
  expected: readonly SqlRow[],
  ordered = false,
): boolean {
  if (actual.length !== expected.length) {
    return false
  }

  if (ordered) {
    return actual.every((row, idx) => rowsMatch(row, expected[idx]))
  }

  const remaining = [...expected]
  for (const row of actual) {
    const idx = remaining.findIndex((candidate) => rowsMatch(row, candidate))
    if (idx < 0) {
      return false
    }
    remaining.splice(idx, 1)
  }

  return true
}

/**
 * Render a value the way the reports show it
 */
export function formatValue(value: SqlValue): string {
  if (value === null) {
    return "NULL"
  }

  if (typeof value === "string") {
    return `'${value}'`
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (Array.isArray(value)) {
    return `{${value.map(formatValue).join(",")}}`
  }

  return String(value)
}

/**
 * Render rows as `[(a, b), (c, d)]`
 */
export function formatRows(rows: readonly SqlRow[]): string {
  return `[${rows.map((row) => `(${row.map(formatValue).join(", ")})`).join(", ")}]`
}
