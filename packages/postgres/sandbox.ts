/**
 * Disposable schemas that isolate one exercise from the next
 */

import { DefaultLogger, type Logger } from "../core/logging.js"
import type { Sandbox, SqlExecutor } from "../query/index.js"

/** Postgres truncates identifiers past this length */
const MAX_IDENTIFIER_LENGTH = 63

/**
 * Quote an identifier for postgres
 *
 * @param identifier The raw identifier
 * @returns The identifier in double quotes with embedded quotes doubled
 */
export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`
}

/**
 * Build the schema name for a sandbox. The same sequence and label always
 * produce the same name.
 *
 * @param sequence The position of the sandbox within the run
 * @param label A readable label, usually the exercise name
 * @returns A lower case identifier such as `drill_3_need_meeting`
 */
export function sandboxSchemaName(sequence: number, label: string): string {
  const slug = label
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "")

  return `drill_${sequence}_${slug}`.slice(0, MAX_IDENTIFIER_LENGTH)
}

/**
 * A schema created for a single exercise and pointed to by `search_path`
 * until disposed
 */
export class PostgresSandbox implements Sandbox {
  readonly schema: string
  readonly #executor: SqlExecutor
  readonly #logger: Logger
  #disposed = false

  private constructor(schema: string, executor: SqlExecutor, logger: Logger) {
    this.schema = schema
    this.#executor = executor
    this.#logger = logger
  }

  /**
   * Create the schema, replacing any copy left behind by an interrupted run,
   * and make it the target of unqualified names
   *
   * @param executor The {@link SqlExecutor} bound to the connection
   * @param schema The schema name to create
   * @param logger Optional {@link Logger}
   * @returns The open {@link PostgresSandbox}
   */
  static async open(
    executor: SqlExecutor,
    schema: string,
    logger?: Logger,
  ): Promise<PostgresSandbox> {
    const quoted = quoteIdentifier(schema)
    await executor.run(`DROP SCHEMA IF EXISTS ${quoted} CASCADE`)
    await executor.run(`CREATE SCHEMA ${quoted}`)
    await executor.run(`SET search_path TO ${quoted}`)

    const sandbox = new PostgresSandbox(
      schema,
      executor,
      logger ?? new DefaultLogger({ name: "sandbox" }),
    )
    sandbox.#logger.debug(`Opened sandbox ${schema}`)
    return sandbox
  }

  get disposed(): boolean {
    return this.#disposed
  }

  async dispose(): Promise<void> {
    if (this.#disposed) {
      return
    }

    this.#disposed = true
    await this.#executor.run("ROLLBACK")
    await this.#executor.run("SET search_path TO DEFAULT")
    await this.#executor.run(
      `DROP SCHEMA IF EXISTS ${quoteIdentifier(this.schema)} CASCADE`,
    )
    this.#logger.debug(`Dropped sandbox ${this.schema}`)
  }
}
