/**
 * Runner configuration: an optional JSON file, the environment and the
 * command line, validated together
 */

import { z } from "zod"
import {
  loadConfiguration,
  mergeConfiguration,
  type ConfigurationObject,
} from "../core/configuration.js"
import type { PostgresConfiguration } from "../postgres/index.js"

export const DatabaseConfigSchema = z.object({
  /** A full connection URI, used instead of the discrete fields */
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).default("localhost"),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  user: z.string().optional(),
  password: z.string().optional(),
  database: z.string().optional(),
  connectTimeoutMs: z.coerce.number().int().min(0).default(10_000),
})

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>

export const RunnerConfigSchema = z.object({
  database: DatabaseConfigSchema.default({}),
  /** Directory holding catalog.json, found relative to the install if unset */
  catalogDirectory: z.string().min(1).optional(),
  logLevel: z.enum(["debug", "info", "warn", "error", "fatal"]).default("warn"),
  format: z.enum(["text", "json"]).default("text"),
  verbose: z.boolean().default(false),
  metrics: z.boolean().default(false),
})

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>

const flag = (value: string | undefined): boolean | undefined =>
  value === undefined ? undefined : /^(1|true|yes|on)$/i.test(value.trim())

/**
 * Read the settings the environment provides. Unset variables are left out
 * so they do not hide values from the configuration file.
 *
 * @param env The environment to read
 * @returns The partial configuration
 */
export function environmentOverrides(
  env: NodeJS.ProcessEnv,
): ConfigurationObject {
  return {
    database: {
      connectionString: env.DRILL_DATABASE_URL,
      host: env.PGHOST,
      port: env.PGPORT,
      user: env.PGUSER,
      password: env.PGPASSWORD,
      database: env.PGDATABASE,
      connectTimeoutMs: env.DRILL_CONNECT_TIMEOUT_MS,
    },
    catalogDirectory: env.DRILL_CATALOG,
    logLevel: env.DRILL_LOG_LEVEL?.toLowerCase(),
    metrics: flag(env.DRILL_METRICS),
  }
}

export interface LoadRunnerConfigurationOptions {
  file?: string
  env?: NodeJS.ProcessEnv
  /** Values from the command line, applied last */
  overrides?: ConfigurationObject
}

/**
 * Load the {@link RunnerConfig}. Precedence from lowest to highest is the
 * file, the environment then the command line.
 *
 * @throws {@link ConfigurationError} if the result does not validate
 */
export function loadRunnerConfiguration(
  options: LoadRunnerConfigurationOptions = {},
): RunnerConfig {
  return loadConfiguration(RunnerConfigSchema, {
    file: options.file,
    overrides: mergeConfiguration(
      environmentOverrides(options.env ?? {}),
      options.overrides ?? {},
    ),
  })
}

/**
 * Translate the database section into the client settings
 */
export function toPostgresConfiguration(
  database: DatabaseConfig,
): PostgresConfiguration {
  return {
    connectionString: database.connectionString,
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    connectionTimeout: database.connectTimeoutMs,
  }
}
