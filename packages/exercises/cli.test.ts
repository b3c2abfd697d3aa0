import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { Writable } from "stream"
import {
  AggregationTemporality,
  InMemoryMetricExporter,
} from "@opentelemetry/sdk-metrics"
import { ConnectionError } from "../query/error.js"
import { ExitCode, USAGE, main, type CliEnvironment } from "./cli.js"
import { FakeEngine, rows } from "./testUtils.js"

class Capture extends Writable {
  text = ""

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.text += chunk.toString()
    callback()
  }
}

function environment(): CliEnvironment & { stdout: Capture; stderr: Capture } {
  return { stdout: new Capture(), stderr: new Capture(), env: {} }
}

const unusedConnector = async (): Promise<FakeEngine> => {
  throw new Error("no connection expected")
}

describe("command line", () => {
  let directory: string = "/this/dir/should/not/exist"

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), "drill-cli-"))
    mkdirSync(join(directory, "sql"))
    writeFileSync(join(directory, "sql", "one.sql"), "CREATE TABLE one (id INT)")
    writeFileSync(join(directory, "sql", "two.sql"), "CREATE TABLE two (id INT)")
    writeFileSync(
      join(directory, "catalog.json"),
      JSON.stringify({
        exercises: [
          {
            name: "one",
            category: "constraint",
            file: "sql/one.sql",
            expectedEffect: "one is created",
            checks: [
              {
                kind: "scalar",
                description: "one is empty",
                sql: "SELECT count(*) FROM one",
                expected: 0,
              },
            ],
          },
          {
            name: "two",
            category: "index",
            file: "sql/two.sql",
            expectedEffect: "two is created",
            checks: [],
          },
        ],
      }),
    )
  })

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it("should print the usage", async () => {
    const io = environment()

    expect(await main(["--help"], io, unusedConnector)).toBe(ExitCode.PASSED)
    expect(io.stdout.text).toBe(USAGE)
  })

  it("should print the version", async () => {
    const io = environment()

    expect(await main(["--version"], io, unusedConnector)).toBe(0)
    expect(io.stdout.text).toBe("0.1.0\n")
  })

  it("should reject unknown options", async () => {
    const io = environment()

    expect(await main(["--bogus"], io, unusedConnector)).toBe(ExitCode.USAGE)
    expect(io.stderr.text).toContain("Unknown option '--bogus'")
  })

  it("should list the bundled exercises without connecting", async () => {
    const io = environment()

    expect(await main(["--list"], io, unusedConnector)).toBe(0)

    const lines = io.stdout.text.trimEnd().split("\n")
    expect(lines).toHaveLength(15)
    expect(lines[0]).toBe("uniq_users (constraint)")
    expect(lines[3]).toBe("glam_rock (query)")
  })

  it("should reject unknown exercises", async () => {
    const io = environment()

    expect(await main(["--only", "nope"], io, unusedConnector)).toBe(64)
    expect(io.stderr.text).toBe("sql-drill: no exercise named nope\n")
  })

  it("should run the catalog and report", async () => {
    const io = environment()
    const engine = new FakeEngine().on("SELECT count(*) FROM one", () =>
      rows(["count"], [0n]),
    )

    const code = await main(["--catalog", directory], io, async () => engine)

    expect(code).toBe(ExitCode.PASSED)
    expect(io.stdout.text).toBe(
      [
        "PASS  one (constraint)",
        "PASS  two (index)",
        "2 exercise(s): 2 passed, 0 failed, 0 errored",
        "",
      ].join("\n"),
    )
    expect(engine.closed).toBe(true)
  })

  it("should run only the selected exercises", async () => {
    const io = environment()
    const engine = new FakeEngine()

    const code = await main(
      ["--catalog", directory, "--only", "two", "--format", "json"],
      io,
      async () => engine,
    )

    expect(code).toBe(0)
    const report = JSON.parse(io.stdout.text)
    expect(report.total).toBe(1)
    expect(report.results[0].exerciseName).toBe("two")
    expect(engine.sandboxes).toEqual(["drill_1_two"])
  })

  it("should exit with 1 when a check fails", async () => {
    const io = environment()
    const engine = new FakeEngine().on("SELECT count(*) FROM one", () =>
      rows(["count"], [3n]),
    )

    expect(await main(["--catalog", directory], io, async () => engine)).toBe(
      ExitCode.FAILED,
    )
    expect(io.stdout.text).toContain("      ✗ one is empty: expected 0, got 3\n")
  })

  it("should exit with 2 when the server cannot be reached", async () => {
    const io = environment()

    const code = await main(["--catalog", directory], io, async () => {
      throw new ConnectionError("connect ECONNREFUSED 127.0.0.1:5432", {
        code: "ECONNREFUSED",
      })
    })

    expect(code).toBe(ExitCode.CONNECTION)
    expect(io.stderr.text).toBe(
      "sql-drill: unable to connect: connect ECONNREFUSED 127.0.0.1:5432\n",
    )
  })

  it("should report partial results when the connection is lost", async () => {
    const io = environment()
    const engine = new FakeEngine().on("CREATE TABLE two (id INT)", () => {
      throw new ConnectionError("Connection terminated unexpectedly")
    })

    const code = await main(
      ["--catalog", directory, "--log-level", "fatal"],
      io,
      async () => engine,
    )

    expect(code).toBe(ExitCode.CONNECTION)
    expect(io.stdout.text).toBe(
      [
        "FAIL  one (constraint)",
        "      ✗ one is empty: query returned no rows",
        "1 exercise(s): 0 passed, 1 failed, 0 errored",
        "",
      ].join("\n"),
    )
    expect(io.stderr.text).toBe(
      "sql-drill: connection lost during two: Connection terminated unexpectedly\n",
    )
    expect(engine.closed).toBe(true)
  })

  it("should export exercise outcomes when metrics are enabled", async () => {
    const exporter = new InMemoryMetricExporter(
      AggregationTemporality.CUMULATIVE,
    )
    const io = {
      ...environment(),
      env: { DRILL_METRICS: "true" },
      metricExporter: exporter,
    }
    const engine = new FakeEngine().on("SELECT count(*) FROM one", () =>
      rows(["count"], [0n]),
    )

    expect(await main(["--catalog", directory], io, async () => engine)).toBe(
      ExitCode.PASSED,
    )

    const outcomes = exporter
      .getMetrics()
      .flatMap((r) => r.scopeMetrics)
      .flatMap((s) => s.metrics)
      .filter((m) => m.descriptor.name === "exercise_outcome")
    expect(outcomes).toHaveLength(1)
    const points: readonly { attributes: unknown; value: unknown }[] =
      outcomes[0].dataPoints
    expect(points.map((p) => [p.attributes, p.value])).toEqual([
      [{ "exercise.status": "pass" }, 2],
    ])
  })
})
