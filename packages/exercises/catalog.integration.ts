import type { PostgresEngine } from "../postgres/index.js"
import { createInProcessEngine } from "../postgres/testUtils.js"
import { SnippetCatalog, findCatalogDirectory } from "./catalog.js"
import { formatTextReport, summarize } from "./reporting.js"
import { ExerciseRunner } from "./runner.js"
import { createExercise } from "./testUtils.js"

/**
 * Runs the bundled catalog against an in-process postgres
 */

describe("the bundled catalog against postgres", () => {
  const catalog = SnippetCatalog.load(findCatalogDirectory(__dirname) ?? "")
  let engine: PostgresEngine | undefined

  beforeAll(async () => {
    engine = await createInProcessEngine()
  }, 60_000)

  afterAll(async () => {
    if (engine) {
      await engine.close()
    }
  })

  async function connected(): Promise<PostgresEngine> {
    if (engine === undefined) {
      throw new Error("engine was not created")
    }

    return engine
  }

  it("should pass every exercise", async () => {
    const results = await new ExerciseRunner(await connected()).run(
      catalog.all(),
    )

    expect(formatTextReport(summarize(results)).split("\n").at(-2)).toBe(
      "15 exercise(s): 15 passed, 0 failed, 0 errored",
    )
  }, 60_000)

  it("should print identical reports on consecutive runs", async () => {
    const first = await createInProcessEngine()
    const second = await createInProcessEngine()

    try {
      const reports = [
        formatTextReport(
          summarize(await new ExerciseRunner(first).run(catalog.all())),
          { verbose: true },
        ),
        formatTextReport(
          summarize(await new ExerciseRunner(second).run(catalog.all())),
          { verbose: true },
        ),
      ]

      expect(reports[1]).toBe(reports[0])
    } finally {
      await first.close()
      await second.close()
    }
  }, 120_000)

  it("should draw the need_meeting boundary at exactly one month", async () => {
    const db = await connected()
    const exercise = catalog.get("need_meeting")
    const sandbox = await db.createSandbox("need_meeting_boundary")

    try {
      await db.run(exercise.setup ?? "")
      await db.run(exercise.sql)
      const { rows } = await db.run("SELECT name FROM need_meeting")
      const names = rows.map(([name]) => name)

      expect(names).toContain("Camilia")
      expect(names).not.toContain("Steeve")
      expect(names).not.toContain("Emma")
    } finally {
      await sandbox.dispose()
    }
  })

  it("should count glam rock lifespans up to 2022", async () => {
    const db = await connected()
    const exercise = catalog.get("glam_rock")
    const sandbox = await db.createSandbox("glam_rock_lifespan")

    try {
      await db.run(exercise.setup ?? "")
      const { rows } = await db.run(exercise.sql)

      expect(rows).toContainEqual(["Velvet Thunder", 42])
      expect(rows).toContainEqual(["Chrome Lace", 10])
    } finally {
      await sandbox.dispose()
    }
  })

  it("should recover the session after an exercise aborts its transaction", async () => {
    const results = await new ExerciseRunner(await connected()).run([
      createExercise({
        name: "aborted",
        sql: "CREATE TABLE t (id INT NOT NULL); BEGIN; INSERT INTO t VALUES (NULL); COMMIT;",
      }),
      createExercise({
        name: "plain",
        sql: "CREATE TABLE plain (id INT PRIMARY KEY)",
        checks: [
          {
            kind: "constraint",
            description: "id is the key",
            table: "plain",
            type: "PRIMARY KEY",
            columns: ["id"],
          },
        ],
      }),
    ])

    expect(
      results.map((r) => [r.exerciseName, r.status, r.errorKind ?? null]),
    ).toEqual([
      ["aborted", "error", "ConstraintViolation"],
      ["plain", "pass", null],
    ])
    expect(results[0].errorPhase).toBe("exercise")
  })
})
