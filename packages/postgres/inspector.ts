/**
 * Reads schema objects out of the postgres catalogs
 */

import type { SqlExecutor, SqlValue } from "../query/index.js"
import {
  normalizeExpression,
  type CheckOption,
  type ConstraintInfo,
  type ConstraintType,
  type IndexInfo,
  type RoutineInfo,
  type RoutineType,
  type SchemaInspector,
  type SchemaObject,
  type SchemaObjectKind,
  type TriggerEvent,
  type TriggerInfo,
  type TriggerTiming,
  type ViewInfo,
} from "../query/inspector.js"

const LIST_OBJECTS = `
SELECT 'table' AS kind, table_name::text AS name
  FROM information_schema.tables
 WHERE table_schema = $1 AND table_type = 'BASE TABLE'
UNION ALL
SELECT 'view', table_name::text
  FROM information_schema.views
 WHERE table_schema = $1
UNION ALL
SELECT 'index', indexname::text
  FROM pg_indexes
 WHERE schemaname = $1
UNION ALL
SELECT DISTINCT 'trigger', event_object_table::text || '.' || trigger_name::text
  FROM information_schema.triggers
 WHERE trigger_schema = $1
UNION ALL
SELECT lower(routine_type::text), routine_name::text
  FROM information_schema.routines
 WHERE routine_schema = $1 AND routine_type IN ('FUNCTION', 'PROCEDURE')
ORDER BY 1, 2`

const LIST_INDEXES = `
SELECT i.relname::text, t.relname::text,
       ARRAY(SELECT pg_get_indexdef(ix.indexrelid, k, true)
               FROM generate_series(1, ix.indnkeyatts) AS k
              ORDER BY k)
  FROM pg_index ix
  JOIN pg_class i ON i.oid = ix.indexrelid
  JOIN pg_class t ON t.oid = ix.indrelid
  JOIN pg_namespace n ON n.oid = t.relnamespace
 WHERE n.nspname = $1 AND ($2::text IS NULL OR t.relname = $2)
 ORDER BY t.relname, i.relname`

const LIST_CONSTRAINTS = `
SELECT c.conname::text, t.relname::text, c.contype::text,
       ARRAY(SELECT a.attname::text
               FROM unnest(c.conkey) WITH ORDINALITY AS k(attnum, ord)
               JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = k.attnum
              ORDER BY k.ord)
  FROM pg_constraint c
  JOIN pg_class t ON t.oid = c.conrelid
  JOIN pg_namespace n ON n.oid = t.relnamespace
 WHERE n.nspname = $1 AND t.relname = $2 AND c.contype IN ('p', 'u', 'c', 'f')
 ORDER BY c.conname`

const DESCRIBE_VIEW = `
SELECT table_name::text, check_option::text
  FROM information_schema.views
 WHERE table_schema = $1 AND table_name = $2`

const LIST_TRIGGERS = `
SELECT trigger_name::text, event_object_table::text, action_timing::text,
       array_agg(event_manipulation::text ORDER BY event_manipulation)
  FROM information_schema.triggers
 WHERE trigger_schema = $1 AND ($2::text IS NULL OR event_object_table = $2)
 GROUP BY trigger_name, event_object_table, action_timing
 ORDER BY 2, 1`

const LIST_ROUTINES = `
SELECT routine_name::text, routine_type::text
  FROM information_schema.routines
 WHERE routine_schema = $1 AND routine_type IN ('FUNCTION', 'PROCEDURE')
 ORDER BY 1`

const CONSTRAINT_TYPES: Readonly<Record<string, ConstraintType>> = {
  p: "PRIMARY KEY",
  u: "UNIQUE",
  c: "CHECK",
  f: "FOREIGN KEY",
}

const OBJECT_KINDS: readonly SchemaObjectKind[] = [
  "table",
  "view",
  "index",
  "trigger",
  "function",
  "procedure",
]

const isObjectKind = (value: string): value is SchemaObjectKind =>
  OBJECT_KINDS.some((k) => k === value)

const isTiming = (value: string): value is TriggerTiming =>
  value === "BEFORE" || value === "AFTER" || value === "INSTEAD OF"

const isEvent = (value: string): value is TriggerEvent =>
  value === "INSERT" ||
  value === "UPDATE" ||
  value === "DELETE" ||
  value === "TRUNCATE"

const isCheckOption = (value: string): value is CheckOption =>
  value === "NONE" || value === "LOCAL" || value === "CASCADED"

const isRoutineType = (value: string): value is RoutineType =>
  value === "FUNCTION" || value === "PROCEDURE"

function text(value: SqlValue | undefined): string {
  return value === null || value === undefined ? "" : String(value)
}

function texts(value: SqlValue | undefined): string[] {
  return Array.isArray(value) ? value.map(text) : []
}

/**
 * Normalize an index key as printed by `pg_get_indexdef`, which adds casts
 * and parentheses, e.g. `"left"((name)::text, 1)` becomes `left(name,1)`
 *
 * @param definition The key definition
 * @returns The normalized expression
 */
export function normalizeIndexColumn(definition: string): string {
  let normalized = normalizeExpression(definition).replace(
    /::[a-z_]+(\[\])?/g,
    "",
  )

  // Drop parentheses wrapping a bare identifier that are not a call
  for (;;) {
    const next = normalized.replace(/(^|[^\w])\(([\w.]+)\)/g, "$1$2")
    if (next === normalized) {
      return normalized
    }
    normalized = next
  }
}

/**
 * {@link SchemaInspector} backed by `information_schema` and `pg_catalog`
 */
export class PostgresSchemaInspector implements SchemaInspector {
  readonly #executor: SqlExecutor

  constructor(executor: SqlExecutor) {
    this.#executor = executor
  }

  async listObjects(schema: string): Promise<SchemaObject[]> {
    const { rows } = await this.#executor.run(LIST_OBJECTS, [schema])

    const objects: SchemaObject[] = []
    for (const [kind, name] of rows) {
      const value = text(kind)
      if (isObjectKind(value)) {
        objects.push({ kind: value, name: text(name) })
      }
    }

    return objects
  }

  async listIndexes(schema: string, table?: string): Promise<IndexInfo[]> {
    const { rows } = await this.#executor.run(LIST_INDEXES, [
      schema,
      table ?? null,
    ])

    return rows.map(([name, owner, columns]) => ({
      name: text(name),
      table: text(owner),
      columns: texts(columns).map(normalizeIndexColumn),
    }))
  }

  async listConstraints(
    schema: string,
    table: string,
  ): Promise<ConstraintInfo[]> {
    const { rows } = await this.#executor.run(LIST_CONSTRAINTS, [
      schema,
      table,
    ])

    const constraints: ConstraintInfo[] = []
    for (const [name, owner, contype, columns] of rows) {
      const type = CONSTRAINT_TYPES[text(contype)]
      if (type !== undefined) {
        constraints.push({
          name: text(name),
          table: text(owner),
          type,
          columns: texts(columns),
        })
      }
    }

    return constraints
  }

  async describeView(
    schema: string,
    view: string,
  ): Promise<ViewInfo | undefined> {
    const { rows } = await this.#executor.run(DESCRIBE_VIEW, [schema, view])
    if (rows.length === 0) {
      return
    }

    const [name, checkOption] = rows[0]
    const option = text(checkOption)

    return {
      name: text(name),
      checkOption: isCheckOption(option) ? option : "NONE",
    }
  }

  async listTriggers(schema: string, table?: string): Promise<TriggerInfo[]> {
    const { rows } = await this.#executor.run(LIST_TRIGGERS, [
      schema,
      table ?? null,
    ])

    const triggers: TriggerInfo[] = []
    for (const [name, owner, timing, events] of rows) {
      const when = text(timing)
      if (isTiming(when)) {
        triggers.push({
          name: text(name),
          table: text(owner),
          timing: when,
          events: texts(events).filter(isEvent),
        })
      }
    }

    return triggers
  }

  async listRoutines(schema: string): Promise<RoutineInfo[]> {
    const { rows } = await this.#executor.run(LIST_ROUTINES, [schema])

    const routines: RoutineInfo[] = []
    for (const [name, routineType] of rows) {
      const type = text(routineType)
      if (isRoutineType(type)) {
        routines.push({ name: text(name), type })
      }
    }

    return routines
  }
}
