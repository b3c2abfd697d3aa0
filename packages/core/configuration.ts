/**
 * Package for handling configuration in an application
 */

import fs from "fs"
import type { z } from "zod"
import { describeError, getErrorCode } from "./errors.js"
import { debug } from "./logging.js"

/** Configuration files larger than this are rejected */
export const MAX_CONFIG_FILE_BYTES = 102_400

/**
 * Raised when configuration cannot be read or does not validate
 */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError"
}

/** A plain JSON object */
export type ConfigurationObject = Record<string, unknown>

function isConfigurationObject(value: unknown): value is ConfigurationObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Read a JSON configuration file
 *
 * @param path The file to read
 * @returns The parsed object
 * @throws {@link ConfigurationError} when the file is missing, too large, not
 * JSON or not an object
 */
export function readConfigurationFile(path: string): ConfigurationObject {
  let contents: string
  try {
    const stats = fs.statSync(path)
    if (stats.size > MAX_CONFIG_FILE_BYTES) {
      throw new ConfigurationError(
        `${path} is larger than ${MAX_CONFIG_FILE_BYTES} bytes`,
      )
    }

    contents = fs.readFileSync(path, "utf8")
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw err
    }

    throw new ConfigurationError(
      getErrorCode(err) === "ENOENT"
        ? `${path} does not exist`
        : `unable to read ${path}: ${describeError(err)}`,
      { cause: err },
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(contents)
  } catch (err) {
    throw new ConfigurationError(`${path} is not valid JSON: ${describeError(err)}`, {
      cause: err,
    })
  }

  if (!isConfigurationObject(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`)
  }

  debug(`Loaded configuration from ${path}`)
  return parsed
}

/**
 * Merge the override into the base, recursing into nested objects. Undefined
 * values in the override leave the base untouched.
 *
 * @param base The starting values
 * @param override The values that take precedence
 * @returns A new merged object
 */
export function mergeConfiguration(
  base: ConfigurationObject,
  override: ConfigurationObject,
): ConfigurationObject {
  const merged: ConfigurationObject = { ...base }
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue
    }

    const current = merged[key]
    merged[key] =
      isConfigurationObject(current) && isConfigurationObject(value)
        ? mergeConfiguration(current, value)
        : value
  }

  return merged
}

/**
 * Render every issue of a failed validation on a single line
 *
 * @param error The {@link z.ZodError} from a failed parse
 * @returns The issues as `path: message` separated by semicolons
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ")
}

/**
 * Options for {@link loadConfiguration}
 */
export interface LoadConfigurationOptions {
  /** Optional JSON file providing the base values */
  file?: string
  /** Values layered over the file (environment, command line) */
  overrides?: ConfigurationObject
}

/**
 * Load the configuration from an optional file plus overrides and validate it
 *
 * @param schema The zod schema describing the configuration
 * @param options The {@link LoadConfigurationOptions}
 * @returns The validated configuration
 * @throws {@link ConfigurationError} listing every validation issue
 */
export function loadConfiguration<S extends z.ZodTypeAny>(
  schema: S,
  options: LoadConfigurationOptions = {},
): z.output<S> {
  const base = options.file ? readConfigurationFile(options.file) : {}
  const raw = mergeConfiguration(base, options.overrides ?? {})

  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `invalid configuration: ${formatIssues(result.error)}`,
    )
  }

  return result.data
}
