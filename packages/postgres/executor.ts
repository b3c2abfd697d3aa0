/**
 * Executor for SQL text
 */

import { ValueType, type Counter, type Histogram } from "@opentelemetry/api"
import { DefaultLogger, type Logger } from "../core/logging.js"
import { getDrillMeter } from "../core/observability/metrics.js"
import { Timer } from "../core/time.js"
import { classifyPostgresError } from "./errors.js"
import {
  emptyRowSet,
  type RowSet,
  type SqlExecutor,
  type SqlValue,
} from "../query/index.js"
import type { QueryArrayConfig, QueryArrayResult } from "pg"

/**
 * The slice of `pg.Client.query` the executor relies on. With several
 * statements in the text pg resolves with one result per statement.
 */
export type PostgresQueryFn = (
  config: QueryArrayConfig,
) => Promise<QueryArrayResult | QueryArrayResult[]>

/**
 * Convert a value produced by the pg type parsers into a {@link SqlValue}
 *
 * @param value The parsed value
 * @returns The value, with buffers as `\x` hex and json objects as text
 */
export function toSqlValue(value: unknown): SqlValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
      return value
    case "undefined":
      return null
  }

  if (value === null || value instanceof Date) {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(toSqlValue)
  }

  if (Buffer.isBuffer(value)) {
    return `\\x${value.toString("hex")}`
  }

  return JSON.stringify(value)
}

function toRowSet(result: QueryArrayResult): RowSet {
  return {
    command: result.command ?? "",
    columns: result.fields.map((f) => f.name),
    rows: result.rows.map((row: unknown[]) => row.map(toSqlValue)),
    rowCount: result.rowCount,
  }
}

/**
 * Options for the {@link PostgresExecutor}
 */
export interface PostgresExecutorOptions {
  logger?: Logger
}

/**
 * Sends SQL text to postgres verbatim and classifies any failure
 */
export class PostgresExecutor implements SqlExecutor {
  readonly #query: PostgresQueryFn
  readonly #logger: Logger
  readonly #duration: Histogram
  readonly #errors: Counter

  constructor(query: PostgresQueryFn, options?: PostgresExecutorOptions) {
    this.#query = query
    this.#logger = options?.logger ?? new DefaultLogger({ name: "postgres" })

    const meter = getDrillMeter()
    this.#duration = meter.createHistogram("query_execution_time", {
      description: "The amount of time the statement took to execute",
      unit: "s",
      valueType: ValueType.DOUBLE,
    })
    this.#errors = meter.createCounter("query_error", {
      description: "The number of statements the engine rejected",
      valueType: ValueType.INT,
    })
  }

  async run(sql: string, values?: readonly unknown[]): Promise<RowSet> {
    const timer = Timer.startNew()

    // Without values pg uses the simple protocol, which accepts scripts
    const config: QueryArrayConfig =
      values === undefined
        ? { text: sql, rowMode: "array" }
        : { text: sql, values: [...values], rowMode: "array" }

    try {
      const raw = await this.#query(config)
      const result = Array.isArray(raw) ? raw[raw.length - 1] : raw
      const duration = timer.stop()

      this.#duration.record(duration.seconds(), {
        "query.command": result?.command ?? "",
      })
      this.#logger.debug(`${result?.command ?? "(empty)"} finished in ${duration}`)

      return result ? toRowSet(result) : emptyRowSet()
    } catch (err) {
      const failure = classifyPostgresError(err)
      this.#errors.add(1, { "error.kind": failure.kind })
      this.#logger.debug(
        `statement failed after ${timer.stop()}: ${failure.kind} ${failure.code ?? ""}`,
      )
      throw failure
    }
  }
}
