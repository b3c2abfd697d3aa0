#!/usr/bin/env node
/**
 * Command line entry point: sql-drill [options]
 */

import { parseArgs } from "util"
import { ConfigurationError } from "../core/configuration.js"
import { describeError } from "../core/errors.js"
import {
  installShutdownHandlers,
  registerShutdown,
  removeShutdown,
} from "../core/lifecycle.js"
import {
  ConsoleLogWriter,
  DefaultLogger,
  LogLevel,
  configureLogging,
  type Logger,
  fatal,
  parseLogLevel,
} from "../core/logging.js"
import { startDrillMetrics } from "../core/observability/metrics.js"
import { SQL_DRILL_VERSION } from "../core/version.js"
import { isConnectionError } from "../query/error.js"
import type { SqlEngine } from "../query/index.js"
import { PostgresEngine, type PostgresConfiguration } from "../postgres/index.js"
import { SnippetCatalog, findCatalogDirectory } from "./catalog.js"
import {
  loadRunnerConfiguration,
  toPostgresConfiguration,
  type RunnerConfig,
} from "./config.js"
import { CatalogError, NotFoundError, RunAbortedError } from "./errors.js"
import {
  exitCodeFor,
  formatJsonReport,
  formatTextReport,
  summarize,
  type RunSummary,
} from "./reporting.js"
import { ExerciseRunner } from "./runner.js"
import type { Exercise } from "./types.js"
import type { PushMetricExporter } from "@opentelemetry/sdk-metrics"

export const ExitCode = {
  PASSED: 0,
  FAILED: 1,
  CONNECTION: 2,
  USAGE: 64,
  ABORTED: 130,
} as const

export const USAGE = `Usage: sql-drill [options]

Runs every exercise of the catalog against a disposable schema and reports
the outcome of each one.

Options:
  --config <file>      JSON configuration file
  --catalog <dir>      directory holding catalog.json
  --only <name>        run only this exercise (repeatable)
  --list               list the exercises and exit
  --format <format>    report format: text (default) or json
  --verbose            show passing checks and schema changes
  --log-level <level>  debug, info, warn (default), error or fatal
  --version            print the version and exit
  -h, --help           show this message

Environment:
  DRILL_DATABASE_URL, PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE,
  DRILL_CONNECT_TIMEOUT_MS, DRILL_CATALOG, DRILL_LOG_LEVEL, DRILL_METRICS
`

/**
 * Where the command writes and what it reads from its surroundings
 */
export interface CliEnvironment {
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  env: NodeJS.ProcessEnv
  /** Receives the metrics when enabled, OTLP over http by default */
  metricExporter?: PushMetricExporter
}

/** Opens the engine for a run */
export type EngineConnector = (
  config: PostgresConfiguration,
) => Promise<SqlEngine>

const defaultEnvironment = (): CliEnvironment => ({
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
})

const connectDefault: EngineConnector = (config) =>
  PostgresEngine.connect(config)

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      config: { type: "string" },
      catalog: { type: "string" },
      only: { type: "string", multiple: true },
      list: { type: "boolean", default: false },
      format: { type: "string" },
      verbose: { type: "boolean" },
      "log-level": { type: "string" },
      version: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  })
}

function render(summary: RunSummary, format: string, verbose: boolean): string {
  return format === "json"
    ? formatJsonReport(summary)
    : formatTextReport(summary, { verbose })
}

/**
 * Run the command
 *
 * @param argv The arguments after the script name
 * @param io The {@link CliEnvironment}, the process by default
 * @param connect How to open the engine, postgres by default
 * @returns The exit code
 */
export async function main(
  argv: readonly string[],
  io: CliEnvironment = defaultEnvironment(),
  connect: EngineConnector = connectDefault,
): Promise<number> {
  let args: ReturnType<typeof parseCommandLine>
  try {
    args = parseCommandLine(argv)
  } catch (err) {
    io.stderr.write(`sql-drill: ${describeError(err)}\n\n${USAGE}`)
    return ExitCode.USAGE
  }

  const { values } = args
  if (values.help) {
    io.stdout.write(USAGE)
    return ExitCode.PASSED
  }

  if (values.version) {
    io.stdout.write(`${SQL_DRILL_VERSION}\n`)
    return ExitCode.PASSED
  }

  let catalog: SnippetCatalog
  let exercises: Exercise[]
  let config: RunnerConfig
  try {
    config = loadRunnerConfiguration({
      file: values.config,
      env: io.env,
      overrides: {
        catalogDirectory: values.catalog,
        format: values.format,
        verbose: values.verbose,
        logLevel: values["log-level"]?.toLowerCase(),
      },
    })

    configureLogging(
      new ConsoleLogWriter(undefined, io.stderr),
      parseLogLevel(config.logLevel) ?? LogLevel.WARN,
    )

    const directory =
      config.catalogDirectory ?? findCatalogDirectory(__dirname)
    if (directory === undefined) {
      throw new CatalogError("unable to find exercises/catalog.json")
    }

    catalog = SnippetCatalog.load(directory)
    exercises = (values.only ?? []).map((name) => catalog.get(name))
  } catch (err) {
    if (
      err instanceof ConfigurationError ||
      err instanceof CatalogError ||
      err instanceof NotFoundError
    ) {
      io.stderr.write(`sql-drill: ${err.message}\n`)
      return ExitCode.USAGE
    }

    throw err
  }

  if (values.list) {
    io.stdout.write(
      catalog
        .all()
        .map((e) => `${e.name} (${e.category})\n`)
        .join(""),
    )
    return ExitCode.PASSED
  }

  if (exercises.length === 0) {
    exercises = catalog.all()
  }

  const logger = new DefaultLogger({ name: "sql-drill" })

  // Instruments are created with the engine, so this has to come first
  const telemetry = config.metrics
    ? startDrillMetrics({ exporter: io.metricExporter })
    : undefined
  try {
    return await runExercises(exercises, config, io, connect, logger)
  } finally {
    if (telemetry !== undefined) {
      try {
        await telemetry.shutdown()
      } catch (err) {
        logger.warn(`failed to flush metrics: ${describeError(err)}`, err)
      }
    }
  }
}

async function runExercises(
  exercises: readonly Exercise[],
  config: RunnerConfig,
  io: CliEnvironment,
  connect: EngineConnector,
  logger: Logger,
): Promise<number> {
  let engine: SqlEngine
  try {
    engine = await connect(toPostgresConfiguration(config.database))
  } catch (err) {
    if (isConnectionError(err)) {
      io.stderr.write(`sql-drill: unable to connect: ${err.message}\n`)
      return ExitCode.CONNECTION
    }

    throw err
  }

  const controller = new AbortController()
  const interrupt = (): void => {
    controller.abort(new Error("interrupted"))
  }
  registerShutdown(interrupt)

  try {
    const runner = new ExerciseRunner(engine, {
      logger,
      signal: controller.signal,
    })
    const summary = summarize(await runner.run(exercises))

    io.stdout.write(render(summary, config.format, config.verbose))
    return exitCodeFor(summary)
  } catch (err) {
    if (err instanceof RunAbortedError) {
      io.stdout.write(
        render(summarize(err.results), config.format, config.verbose),
      )
      io.stderr.write(`sql-drill: ${err.message}\n`)
      return isConnectionError(err.cause)
        ? ExitCode.CONNECTION
        : ExitCode.ABORTED
    }

    throw err
  } finally {
    removeShutdown(interrupt)
    try {
      await engine.close()
    } catch (err) {
      logger.warn(`failed to close the connection: ${describeError(err)}`, err)
    }
  }
}

if (require.main === module) {
  installShutdownHandlers()
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err: unknown) => {
      fatal(`unexpected failure: ${describeError(err)}`, err)
      process.stderr.write(`sql-drill: ${describeError(err)}\n`)
      process.exitCode = ExitCode.FAILED
    },
  )
}
