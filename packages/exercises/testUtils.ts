import type { Optional } from "../core/type/utils.js"
import {
  emptyRowSet,
  type RowSet,
  type Sandbox,
  type SqlEngine,
  type SqlValue,
} from "../query/index.js"
import type {
  ConstraintInfo,
  IndexInfo,
  RoutineInfo,
  SchemaInspector,
  SchemaObject,
  TriggerInfo,
  ViewInfo,
} from "../query/inspector.js"
import type { Exercise } from "./types.js"

/**
 * Test utilities for the exercise harness: an in-memory engine that answers
 * statements from registered handlers
 */

/**
 * Answers a statement. Returning anything other than a {@link RowSet} yields
 * an empty result; throwing simulates an engine failure.
 */
export type FakeHandler = (values?: readonly unknown[]) => unknown

function isRowSet(value: unknown): value is RowSet {
  return (
    typeof value === "object" &&
    value !== null &&
    "columns" in value &&
    "rows" in value &&
    Array.isArray(value.rows)
  )
}

/**
 * Build a {@link RowSet} for a SELECT
 */
export function rows(columns: string[], ...data: SqlValue[][]): RowSet {
  return { command: "SELECT", columns, rows: data, rowCount: data.length }
}

/**
 * A {@link SchemaInspector} over plain arrays the test fills in
 */
export class FakeInspector implements SchemaInspector {
  objects: SchemaObject[] = []
  indexes: IndexInfo[] = []
  constraints: ConstraintInfo[] = []
  views: ViewInfo[] = []
  triggers: TriggerInfo[] = []
  routines: RoutineInfo[] = []

  async listObjects(_schema: string): Promise<SchemaObject[]> {
    return [...this.objects]
  }

  async listIndexes(_schema: string, table?: string): Promise<IndexInfo[]> {
    return this.indexes.filter((i) => table === undefined || i.table === table)
  }

  async listConstraints(
    _schema: string,
    table: string,
  ): Promise<ConstraintInfo[]> {
    return this.constraints.filter((c) => c.table === table)
  }

  async describeView(
    _schema: string,
    view: string,
  ): Promise<Optional<ViewInfo>> {
    return this.views.find((v) => v.name === view)
  }

  async listTriggers(_schema: string, table?: string): Promise<TriggerInfo[]> {
    return this.triggers.filter(
      (t) => table === undefined || t.table === table,
    )
  }

  async listRoutines(_schema: string): Promise<RoutineInfo[]> {
    return [...this.routines]
  }
}

/**
 * An in-process {@link SqlEngine} that records every statement
 */
export class FakeEngine implements SqlEngine {
  readonly inspector = new FakeInspector()
  readonly executed: string[] = []
  readonly sandboxes: string[] = []
  readonly disposed: string[] = []
  closed = false

  readonly #handlers = new Map<string, FakeHandler>()

  /**
   * Register the handler for a statement, matched on its trimmed text
   */
  on(sql: string, handler: FakeHandler): this {
    this.#handlers.set(sql.trim(), handler)
    return this
  }

  async run(sql: string, values?: readonly unknown[]): Promise<RowSet> {
    this.executed.push(sql.trim())

    const handler = this.#handlers.get(sql.trim())
    const result: unknown = handler ? await handler(values) : undefined
    return isRowSet(result) ? result : emptyRowSet()
  }

  async createSandbox(label: string): Promise<Sandbox> {
    const schema = `drill_${this.sandboxes.length + 1}_${label}`
    this.sandboxes.push(schema)

    return {
      schema,
      dispose: async () => {
        this.disposed.push(schema)
      },
    }
  }

  async rollback(): Promise<void> {
    await this.run("ROLLBACK")
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

/**
 * Create an exercise with sensible defaults for tests
 */
export function createExercise(overrides: Partial<Exercise> = {}): Exercise {
  return {
    name: "sample",
    category: "constraint",
    sql: "CREATE TABLE sample (id INT)",
    expectedEffect: "sample is created",
    checks: [],
    ...overrides,
  }
}
