/**
 * The postgres {@link SqlEngine}
 */

import { DefaultLogger, type Logger } from "../core/logging.js"
import type { RowSet, Sandbox, SqlEngine } from "../query/index.js"
import { connectPostgres, type PostgresConfiguration } from "./connection.js"
import { PostgresExecutor, type PostgresQueryFn } from "./executor.js"
import { PostgresSchemaInspector } from "./inspector.js"
import { PostgresSandbox, sandboxSchemaName } from "./sandbox.js"

export { type PostgresConfiguration } from "./connection.js"

/**
 * The connection an engine owns: something that answers queries and can be
 * closed
 */
export interface PostgresSession {
  query: PostgresQueryFn
  end(): Promise<void>
}

/**
 * A single exclusively owned connection with sandbox support
 */
export class PostgresEngine implements SqlEngine {
  readonly inspector: PostgresSchemaInspector
  readonly #session: PostgresSession
  readonly #executor: PostgresExecutor
  readonly #logger: Logger
  #sandboxes = 0

  constructor(session: PostgresSession, logger?: Logger) {
    this.#session = session
    this.#logger = logger ?? new DefaultLogger({ name: "postgres" })
    this.#executor = new PostgresExecutor(session.query, {
      logger: this.#logger,
    })
    this.inspector = new PostgresSchemaInspector(this.#executor)
  }

  /**
   * Connect to the server described by the configuration
   *
   * @param config The {@link PostgresConfiguration}
   * @param logger Optional {@link Logger} for the engine
   * @returns A connected {@link PostgresEngine}
   * @throws {@link ConnectionError} when the server cannot be reached
   */
  static async connect(
    config: PostgresConfiguration,
    logger?: Logger,
  ): Promise<PostgresEngine> {
    const client = await connectPostgres(config)
    return new PostgresEngine(
      { query: (query) => client.query(query), end: () => client.end() },
      logger,
    )
  }

  run(sql: string, values?: readonly unknown[]): Promise<RowSet> {
    return this.#executor.run(sql, values)
  }

  createSandbox(label: string): Promise<Sandbox> {
    this.#sandboxes++
    return PostgresSandbox.open(
      this.#executor,
      sandboxSchemaName(this.#sandboxes, label),
      this.#logger,
    )
  }

  async rollback(): Promise<void> {
    // Outside a transaction this is only a warning notice
    await this.#executor.run("ROLLBACK")
  }

  async close(): Promise<void> {
    this.#logger.info(`Postgres: closing connection`)
    await this.#session.end()
  }
}
