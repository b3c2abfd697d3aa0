/**
 * Engine agnostic contracts for executing SQL text and reading the results
 */

import type { SchemaInspector } from "./inspector.js"

/**
 * The values a driver can hand back for a single cell
 */
export type SqlValue =
  | string
  | number
  | boolean
  | bigint
  | Date
  | null
  | readonly SqlValue[]

/**
 * A single row, with values in column order
 */
export type SqlRow = readonly SqlValue[]

/**
 * The result of executing a statement (or the last statement of a script)
 */
export interface RowSet {
  /** The command tag reported by the engine (SELECT, INSERT, CREATE, ...) */
  readonly command: string
  /** The column names in order */
  readonly columns: readonly string[]
  /** The rows returned, empty for statements that produce none */
  readonly rows: readonly SqlRow[]
  /** The number of rows affected or returned when the engine reports it */
  readonly rowCount: number | null
}

/**
 * An empty {@link RowSet} for statements that return nothing
 */
export function emptyRowSet(command = ""): RowSet {
  return { command, columns: [], rows: [], rowCount: null }
}

/**
 * Represents an object that is capable of executing SQL text
 */
export interface SqlExecutor {
  /**
   * Sends the text to the engine and returns the rows it produced
   *
   * @param sql The SQL text, sent as is
   * @param values Optional positional parameters ($1, $2, ...); scripts with
   * several statements cannot take parameters
   *
   * @returns The {@link RowSet} of the (last) statement
   * @throws A {@link QueryError} subclass describing the failure
   */
  run(sql: string, values?: readonly unknown[]): Promise<RowSet>
}

/**
 * A disposable namespace that statements run in while it is open
 */
export interface Sandbox {
  /** The schema name created for the sandbox */
  readonly schema: string

  /**
   * Drop the sandbox and everything created in it
   */
  dispose(): Promise<void>
}

/**
 * Everything the exercise harness needs from a relational engine
 */
export interface SqlEngine extends SqlExecutor {
  /** Reads the engine catalogs */
  readonly inspector: SchemaInspector

  /**
   * Create a fresh sandbox and make it the target of unqualified names
   *
   * @param label A readable label folded into the schema name
   */
  createSandbox(label: string): Promise<Sandbox>

  /**
   * Abandon any open transaction, including one an error left aborted, so
   * the session accepts statements again
   */
  rollback(): Promise<void>

  /**
   * Release the connection
   */
  close(): Promise<void>
}
