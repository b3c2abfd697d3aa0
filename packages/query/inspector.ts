/**
 * Contracts for reading the schema objects an engine knows about
 */

/** The kinds of schema object tracked between snapshots */
export type SchemaObjectKind =
  | "table"
  | "view"
  | "index"
  | "trigger"
  | "function"
  | "procedure"

/**
 * A named object living in a schema. Triggers are named `table.trigger`.
 */
export interface SchemaObject {
  readonly kind: SchemaObjectKind
  readonly name: string
}

/**
 * The objects added and removed between two snapshots
 */
export interface SchemaDelta {
  readonly added: readonly SchemaObject[]
  readonly removed: readonly SchemaObject[]
}

export interface IndexInfo {
  readonly name: string
  readonly table: string
  /** The indexed columns or expressions, in key order */
  readonly columns: readonly string[]
}

export type ConstraintType = "PRIMARY KEY" | "UNIQUE" | "CHECK" | "FOREIGN KEY"

export interface ConstraintInfo {
  readonly name: string
  readonly table: string
  readonly type: ConstraintType
  /** The key columns, empty for check constraints */
  readonly columns: readonly string[]
}

export type CheckOption = "NONE" | "LOCAL" | "CASCADED"

export interface ViewInfo {
  readonly name: string
  readonly checkOption: CheckOption
}

export type TriggerTiming = "BEFORE" | "AFTER" | "INSTEAD OF"

export type TriggerEvent = "INSERT" | "UPDATE" | "DELETE" | "TRUNCATE"

export interface TriggerInfo {
  readonly name: string
  readonly table: string
  readonly timing: TriggerTiming
  readonly events: readonly TriggerEvent[]
}

export type RoutineType = "FUNCTION" | "PROCEDURE"

export interface RoutineInfo {
  readonly name: string
  readonly type: RoutineType
}

/**
 * Reads the engine catalogs for a single schema
 */
export interface SchemaInspector {
  listObjects(schema: string): Promise<SchemaObject[]>
  listIndexes(schema: string, table?: string): Promise<IndexInfo[]>
  listConstraints(schema: string, table: string): Promise<ConstraintInfo[]>
  describeView(schema: string, view: string): Promise<ViewInfo | undefined>
  listTriggers(schema: string, table?: string): Promise<TriggerInfo[]>
  listRoutines(schema: string): Promise<RoutineInfo[]>
}

const objectKey = (object: SchemaObject): string =>
  `${object.kind}:${object.name}`

const compareObjects = (a: SchemaObject, b: SchemaObject): number =>
  a.kind === b.kind
    ? a.name.localeCompare(b.name)
    : a.kind.localeCompare(b.kind)

/**
 * Compute what changed between two snapshots of a schema
 *
 * @param before The objects present before
 * @param after The objects present after
 * @returns The {@link SchemaDelta}, each side sorted by kind then name
 */
export function diffSchemaObjects(
  before: readonly SchemaObject[],
  after: readonly SchemaObject[],
): SchemaDelta {
  const beforeKeys = new Set(before.map(objectKey))
  const afterKeys = new Set(after.map(objectKey))

  return {
    added: after.filter((o) => !beforeKeys.has(objectKey(o))).sort(compareObjects),
    removed: before
      .filter((o) => !afterKeys.has(objectKey(o)))
      .sort(compareObjects),
  }
}

/**
 * Normalize a column or index expression for comparison: lower case, no
 * identifier quoting and no whitespace
 *
 * @param expression The expression as written or as reported by the engine
 * @returns The normalized form
 */
export function normalizeExpression(expression: string): string {
  return expression.toLowerCase().replace(/["`]/g, "").replace(/\s+/g, "")
}
