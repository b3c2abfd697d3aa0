/**
 * The registry of exercises, loaded once from `catalog.json`
 */

import fs from "fs"
import path from "path"
import { formatIssues } from "../core/configuration.js"
import { describeError, getErrorCode } from "../core/errors.js"
import { debug } from "../core/logging.js"
import type { Optional } from "../core/type/utils.js"
import { CatalogError, NotFoundError } from "./errors.js"
import { CatalogSchema, type CatalogEntry } from "./schema.js"
import type { Exercise } from "./types.js"

/** The index file every catalog directory holds */
export const CATALOG_FILE = "catalog.json"

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }

  return value
}

function readText(file: string): string {
  try {
    return fs.readFileSync(file, "utf8")
  } catch (err) {
    throw new CatalogError(
      getErrorCode(err) === "ENOENT"
        ? `${file} does not exist`
        : `unable to read ${file}: ${describeError(err)}`,
      { cause: err },
    )
  }
}

/**
 * Resolve a path from the catalog, refusing anything outside its directory
 */
function resolveWithin(directory: string, relative: string): string {
  const resolved = path.resolve(directory, relative)
  if (!resolved.startsWith(directory + path.sep)) {
    throw new CatalogError(`${relative} is outside of ${directory}`)
  }

  return resolved
}

/**
 * Walk up from the starting directory looking for `exercises/catalog.json`
 *
 * @param start The directory to start from
 * @returns The catalog directory or undefined if none was found
 */
export function findCatalogDirectory(start: string): Optional<string> {
  let current = path.resolve(start)
  for (;;) {
    const candidate = path.join(current, "exercises")
    if (fs.existsSync(path.join(candidate, CATALOG_FILE))) {
      return candidate
    }

    const parent = path.dirname(current)
    if (parent === current) {
      return
    }
    current = parent
  }
}

/**
 * In-memory registry mapping exercise names to their {@link Exercise}. The
 * contents cannot change once built.
 */
export class SnippetCatalog {
  readonly #exercises: Map<string, Exercise>

  private constructor(exercises: Map<string, Exercise>) {
    this.#exercises = exercises
  }

  /**
   * Build a catalog from exercises already in memory
   *
   * @param exercises The exercises in declaration order
   * @throws {@link CatalogError} if two exercises share a name
   */
  static fromExercises(exercises: Iterable<Exercise>): SnippetCatalog {
    const registry = new Map<string, Exercise>()
    for (const exercise of exercises) {
      if (registry.has(exercise.name)) {
        throw new CatalogError(`duplicate exercise name ${exercise.name}`)
      }

      registry.set(exercise.name, deepFreeze(structuredClone(exercise)))
    }

    return new SnippetCatalog(registry)
  }

  /**
   * Load `catalog.json` from the directory along with every SQL file and
   * fixture it references
   *
   * @param directory The catalog directory
   * @returns The loaded {@link SnippetCatalog}
   * @throws {@link CatalogError} when a file is missing or the index is invalid
   */
  static load(directory: string): SnippetCatalog {
    const root = path.resolve(directory)
    const indexFile = path.join(root, CATALOG_FILE)

    let raw: unknown
    try {
      raw = JSON.parse(readText(indexFile))
    } catch (err) {
      if (err instanceof CatalogError) {
        throw err
      }

      throw new CatalogError(
        `${indexFile} is not valid JSON: ${describeError(err)}`,
        { cause: err },
      )
    }

    const parsed = CatalogSchema.safeParse(raw)
    if (!parsed.success) {
      throw new CatalogError(
        `invalid catalog ${indexFile}: ${formatIssues(parsed.error)}`,
      )
    }

    const exercises = parsed.data.exercises.map((entry) =>
      SnippetCatalog.#toExercise(root, entry),
    )
    debug(`Loaded ${exercises.length} exercises from ${indexFile}`)

    return SnippetCatalog.fromExercises(exercises)
  }

  static #toExercise(root: string, entry: CatalogEntry): Exercise {
    const sql = readText(resolveWithin(root, entry.file))
    if (sql.trim().length === 0) {
      throw new CatalogError(`${entry.file} for ${entry.name} is empty`)
    }

    return {
      name: entry.name,
      category: entry.category,
      sql,
      expectedEffect: entry.expectedEffect,
      setup:
        entry.setup !== undefined
          ? readText(resolveWithin(root, entry.setup))
          : undefined,
      checks: entry.checks,
      source: entry.file,
    }
  }

  /**
   * Get an exercise by name
   *
   * @param name The exercise name
   * @returns The {@link Exercise}
   * @throws {@link NotFoundError} if there is no exercise with that name
   */
  get(name: string): Exercise {
    const exercise = this.#exercises.get(name)
    if (exercise === undefined) {
      throw new NotFoundError(name)
    }

    return exercise
  }

  /**
   * @returns Every exercise in declaration order
   */
  all(): Exercise[] {
    return Array.from(this.#exercises.values())
  }
}
