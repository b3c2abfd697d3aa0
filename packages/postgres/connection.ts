/**
 * Postgres connections
 */

import { debug, error, warn } from "../core/logging.js"
import { ConnectionError } from "../query/error.js"
import { Client, types, type ClientConfig } from "pg"
import { classifyPostgresError } from "./errors.js"

const SAFE_INT_REGEX = /^(-)?[0-8]?\d{1,15}$/

const safeBigInt = (v: string): number | bigint => {
  return SAFE_INT_REGEX.test(v)
    ? Number(v) // If number is less than 16 digits that start with a 9 we don't care
    : (v.startsWith("-") ? v.substring(1) : v) > "9007199254740991"
      ? BigInt(v)
      : Number(v)
}

/**
 * Text parsers by type oid. Counts and sums come back as int8/numeric, which
 * pg would leave as strings, and dates stay YYYY-MM-DD rather than a Date at
 * local midnight.
 */
export const VALUE_PARSERS: Readonly<Record<number, (v: string) => unknown>> =
  {
    [types.builtins.INT8]: (v) => (v ? safeBigInt(v) : null),
    [types.builtins.NUMERIC]: (v) => (v ? Number(v) : null),
    [types.builtins.DATE]: (v) => v,
  }

for (const [oid, parse] of Object.entries(VALUE_PARSERS)) {
  types.setTypeParser(Number(oid), parse)
}

/**
 * The settings used to reach the server
 */
export interface PostgresConfiguration {
  /** A full connection URI, takes precedence over the discrete fields */
  connectionString?: string
  user?: string
  password?: string
  database?: string
  host?: string
  port?: number
  /** Milliseconds to wait for the connection to be established */
  connectionTimeout?: number
  /** The application name reported to the server */
  applicationName?: string
}

/**
 * Translate the {@link PostgresConfiguration} into the `pg` client options
 */
export function toClientConfig(config: PostgresConfiguration): ClientConfig {
  const common: ClientConfig = {
    connectionTimeoutMillis: config.connectionTimeout,
    application_name: config.applicationName ?? "sql-drill",
  }

  return config.connectionString
    ? { ...common, connectionString: config.connectionString }
    : {
        ...common,
        user: config.user,
        password: config.password,
        database: config.database,
        host: config.host,
        port: config.port,
      }
}

/**
 * Open a single client connection
 *
 * @param config The {@link PostgresConfiguration} to connect with
 * @returns A connected `pg` {@link Client}
 * @throws {@link ConnectionError} when the server cannot be reached or refuses
 * the connection
 */
export async function connectPostgres(
  config: PostgresConfiguration,
): Promise<Client> {
  const clientConfig = toClientConfig(config)
  debug(`Creating new pg.Client ${clientConfig.host ?? "from connection string"}`)

  const client = new Client(clientConfig)

  // An unhandled 'error' event would take the process down
  client.on("error", (err) => {
    error(`pg.Client error: ${err.message}`, err)
  })
  client.on("notice", (notice) => {
    debug(`server notice: ${notice.message ?? "(empty)"}`)
  })

  try {
    await client.connect()
  } catch (err) {
    const failure = classifyPostgresError(err)
    client.end().catch((endErr: unknown) => {
      warn(`Failure during client.end after a failed connect`, endErr)
    })

    throw failure instanceof ConnectionError
      ? failure
      : new ConnectionError(failure.message, {
          code: failure.code,
          cause: err,
        })
  }

  debug(`Created client successfully`)
  return client
}
