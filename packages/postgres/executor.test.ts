import type { FieldDef, QueryArrayConfig, QueryArrayResult } from "pg"
import { ConstraintViolation, EngineError } from "../query/error.js"
import { PostgresExecutor, toSqlValue } from "./executor.js"

function field(name: string): FieldDef {
  return {
    name,
    tableID: 0,
    columnID: 0,
    dataTypeID: 25,
    dataTypeSize: -1,
    dataTypeModifier: -1,
    format: "text",
  }
}

function result(
  command: string,
  columns: string[],
  rows: unknown[][] = [],
): QueryArrayResult {
  return {
    command,
    rowCount: rows.length,
    oid: 0,
    fields: columns.map(field),
    rows,
  }
}

describe("postgres executor", () => {
  it("should send text without values over the simple protocol", async () => {
    const sent: QueryArrayConfig[] = []
    const executor = new PostgresExecutor(async (config) => {
      sent.push(config)
      return result("SELECT", ["origin", "nb_fans"], [["UK", 70]])
    })

    const rows = await executor.run("SELECT origin, nb_fans FROM fans")

    expect(sent).toEqual([
      { text: "SELECT origin, nb_fans FROM fans", rowMode: "array" },
    ])
    expect(rows).toEqual({
      command: "SELECT",
      columns: ["origin", "nb_fans"],
      rows: [["UK", 70]],
      rowCount: 1,
    })
  })

  it("should pass values when provided", async () => {
    const sent: QueryArrayConfig[] = []
    const executor = new PostgresExecutor(async (config) => {
      sent.push(config)
      return result("SELECT", ["name"])
    })

    await executor.run("SELECT name FROM users WHERE id = $1", [1])

    expect(sent[0].values).toEqual([1])
  })

  it("should return the last result of a script", async () => {
    const executor = new PostgresExecutor(async () => [
      result("CREATE", []),
      result("INSERT", [], []),
      result("SELECT", ["count"], [[2]]),
    ])

    const rows = await executor.run(
      "CREATE TABLE t (id INT); INSERT INTO t VALUES (1), (2); SELECT count(*) FROM t",
    )

    expect(rows.command).toBe("SELECT")
    expect(rows.rows).toEqual([[2]])
  })

  it("should return an empty row set for an empty script", async () => {
    const executor = new PostgresExecutor(async () => [])

    expect(await executor.run("")).toEqual({
      command: "",
      columns: [],
      rows: [],
      rowCount: null,
    })
  })

  it("should classify failures", async () => {
    const executor = new PostgresExecutor(async () => {
      throw Object.assign(new Error("new row violates check constraint"), {
        code: "23514",
      })
    })

    await expect(executor.run("INSERT INTO users VALUES (1)")).rejects.toThrow(
      ConstraintViolation,
    )

    const failing = new PostgresExecutor(async () => {
      throw Object.assign(new Error('function nope() does not exist'), {
        code: "42883",
      })
    })
    await expect(failing.run("SELECT nope()")).rejects.toThrow(EngineError)
  })

  it("should convert driver values", () => {
    expect(toSqlValue(Buffer.from([1, 171]))).toBe("\\x01ab")
    expect(toSqlValue({ a: 1 })).toBe(`{"a":1}`)
    expect(toSqlValue(undefined)).toBeNull()
    expect(toSqlValue(["a", null])).toEqual(["a", null])
    expect(toSqlValue(12n)).toBe(12n)
  })
})
