/**
 * Summaries and reports for a set of {@link ExecutionResult}s
 */

import type { SchemaObject } from "../query/inspector.js"
import type { ExecutionResult } from "./types.js"

export interface RunSummary {
  readonly results: readonly ExecutionResult[]
  readonly total: number
  readonly passed: number
  readonly failed: number
  readonly errored: number
}

export interface TextReportOptions {
  /** Include passing checks and the observed schema delta */
  verbose?: boolean
}

/**
 * Count the outcomes of a run
 */
export function summarize(results: readonly ExecutionResult[]): RunSummary {
  return {
    results,
    total: results.length,
    passed: results.filter((r) => r.status === "pass").length,
    failed: results.filter((r) => r.status === "fail").length,
    errored: results.filter((r) => r.status === "error").length,
  }
}

const LABELS = {
  pass: "PASS",
  fail: "FAIL",
  error: "ERROR",
} as const

const describeObject = (object: SchemaObject): string =>
  `${object.kind} ${object.name}`

function reportLines(result: ExecutionResult, verbose: boolean): string[] {
  const heading = `${LABELS[result.status].padEnd(5)} ${result.exerciseName} (${result.category})`

  if (result.status === "error") {
    const kind = result.errorKind ?? "Error"
    return [
      `${heading}: ${kind} in ${result.errorPhase ?? "exercise"}: ${result.errorMessage ?? ""}`,
    ]
  }

  const lines = [heading]
  for (const check of result.checks) {
    if (!check.passed) {
      lines.push(`      ✗ ${check.description}: ${check.message ?? "failed"}`)
    } else if (verbose) {
      lines.push(`      ✓ ${check.description}`)
    }
  }

  if (verbose) {
    const { added, removed } = result.observedSchemaDelta
    lines.push(...added.map((o) => `      + ${describeObject(o)}`))
    lines.push(...removed.map((o) => `      - ${describeObject(o)}`))
  }

  return lines
}

/**
 * Render the summary as plain text: one line per exercise (failed checks
 * indented below it) then the totals. Nothing in the report depends on
 * timing.
 *
 * @param summary The {@link RunSummary} to render
 * @param options The {@link TextReportOptions}
 * @returns The report, ending with a newline
 */
export function formatTextReport(
  summary: RunSummary,
  options: TextReportOptions = {},
): string {
  const lines = summary.results.flatMap((r) =>
    reportLines(r, options.verbose ?? false),
  )

  lines.push(
    `${summary.total} exercise(s): ${summary.passed} passed, ${summary.failed} failed, ${summary.errored} errored`,
  )

  return `${lines.join("\n")}\n`
}

/**
 * Render the summary as indented JSON
 */
export function formatJsonReport(summary: RunSummary): string {
  return `${JSON.stringify(
    {
      total: summary.total,
      passed: summary.passed,
      failed: summary.failed,
      errored: summary.errored,
      results: summary.results,
    },
    null,
    2,
  )}\n`
}

/**
 * @returns 0 when every exercise passed, 1 otherwise
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.passed === summary.total ? 0 : 1
}
