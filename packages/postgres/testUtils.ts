import { PGlite } from "@electric-sql/pglite"
import type { FieldDef, QueryArrayConfig, QueryArrayResult } from "pg"
import type { Logger } from "../core/logging.js"
import { VALUE_PARSERS } from "./connection.js"
import { PostgresEngine, type PostgresSession } from "./index.js"

/**
 * Test utilities that run a real postgres inside the test process
 */

/** The shape of a PGlite result we read */
interface InProcessResult {
  rows: unknown[]
  affectedRows?: number
  fields: { name: string; dataTypeID: number }[]
}

const toField = (field: { name: string; dataTypeID: number }): FieldDef => ({
  name: field.name,
  tableID: 0,
  columnID: 0,
  dataTypeID: field.dataTypeID,
  dataTypeSize: -1,
  dataTypeModifier: -1,
  format: "text",
})

const toRow = (row: unknown): unknown[] =>
  Array.isArray(row)
    ? row
    : typeof row === "object" && row !== null
      ? Object.values(row)
      : [row]

function toQueryResult(result: InProcessResult): QueryArrayResult {
  return {
    command: "",
    rowCount: result.affectedRows ?? result.rows.length,
    oid: 0,
    fields: result.fields.map(toField),
    rows: result.rows.map(toRow),
  }
}

/**
 * Open a {@link PostgresSession} on a fresh in-memory PGlite database. Text
 * without values goes through `exec` so scripts with several statements run
 * the way they do over the simple protocol.
 */
export async function createInProcessSession(): Promise<PostgresSession> {
  const db = await PGlite.create()
  const options = { rowMode: "array" as const, parsers: { ...VALUE_PARSERS } }

  return {
    query: async (config: QueryArrayConfig) => {
      if (config.values === undefined) {
        const results = await db.exec(config.text, options)
        return results.map(toQueryResult)
      }

      return toQueryResult(await db.query(config.text, config.values, options))
    },
    end: () => db.close(),
  }
}

/**
 * Create a {@link PostgresEngine} over a fresh in-memory database
 */
export async function createInProcessEngine(
  logger?: Logger,
): Promise<PostgresEngine> {
  return new PostgresEngine(await createInProcessSession(), logger)
}
