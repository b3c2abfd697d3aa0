import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { SnippetCatalog, findCatalogDirectory } from "./catalog.js"
import { CatalogError, NotFoundError } from "./errors.js"
import { createExercise } from "./testUtils.js"

describe("the bundled catalog", () => {
  const directory = findCatalogDirectory(__dirname)

  it("should be found from the package", () => {
    expect(directory).toBeDefined()
  })

  it("should load every exercise in declaration order", () => {
    const catalog = SnippetCatalog.load(directory ?? "")

    expect(catalog.all().map((e) => e.name)).toEqual([
      "uniq_users",
      "country_users",
      "fans",
      "glam_rock",
      "store",
      "valid_email",
      "bonus",
      "average_score",
      "index_my_names",
      "index_name_score",
      "safe_div",
      "need_meeting",
      "passing_students",
      "score_audit",
      "score_guard",
    ])
    expect(catalog.all().every((e) => e.checks.length > 0)).toBe(true)
  })

  it("should read the SQL and fixtures", () => {
    const glamRock = SnippetCatalog.load(directory ?? "").get("glam_rock")

    expect(glamRock.category).toBe("query")
    expect(glamRock.source).toBe("sql/3-glam_rock.sql")
    expect(glamRock.sql).toContain("AS lifespan")
    expect(glamRock.setup).toContain("CREATE TABLE metal_bands")
  })

  it("should refuse unknown names", () => {
    const catalog = SnippetCatalog.load(directory ?? "")

    expect(() => catalog.get("nope")).toThrow(NotFoundError)
    expect(() => catalog.get("nope")).toThrow("no exercise named nope")
  })
})

describe("catalog loading", () => {
  let directory: string = "/this/dir/should/not/exist"

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "drill-catalog-"))
    mkdirSync(join(directory, "sql"))
    writeFileSync(join(directory, "sql", "one.sql"), "CREATE TABLE one (id INT);")
  })

  afterEach(() => {
    if (existsSync(directory)) {
      rmSync(directory, {
        recursive: true,
        force: true,
      })
    }
  })

  function writeCatalog(contents: unknown): void {
    writeFileSync(
      join(directory, "catalog.json"),
      typeof contents === "string" ? contents : JSON.stringify(contents),
    )
  }

  const entry = (name: string, file = "sql/one.sql") => ({
    name,
    category: "constraint",
    file,
    expectedEffect: "one is created",
    checks: [{ kind: "accepts", description: "insert", sql: "INSERT INTO one VALUES (1)" }],
  })

  it("should reject duplicate names", () => {
    writeCatalog({ exercises: [entry("one"), entry("one")] })

    expect(() => SnippetCatalog.load(directory)).toThrow(
      "duplicate exercise name one",
    )
  })

  it("should reject missing files", () => {
    writeCatalog({ exercises: [entry("two", "sql/two.sql")] })

    expect(() => SnippetCatalog.load(directory)).toThrow(
      `${join(directory, "sql", "two.sql")} does not exist`,
    )
  })

  it("should reject files outside the catalog", () => {
    writeCatalog({ exercises: [entry("escape", "../outside.sql")] })

    expect(() => SnippetCatalog.load(directory)).toThrow(
      `../outside.sql is outside of ${directory}`,
    )
  })

  it("should reject a missing or malformed index", () => {
    expect(() => SnippetCatalog.load(directory)).toThrow(CatalogError)

    writeCatalog("{ not json")
    expect(() => SnippetCatalog.load(directory)).toThrow("is not valid JSON")
  })

  it("should report schema issues with their path", () => {
    writeCatalog({
      exercises: [{ ...entry("Bad Name"), checks: [{ kind: "guess" }] }],
    })

    expect(() => SnippetCatalog.load(directory)).toThrow(
      /exercises\.0\.name: must be lower case letters, digits and underscores; exercises\.0\.checks\.0\.kind: Invalid discriminator value/,
    )
  })

  it("should freeze loaded exercises", () => {
    writeCatalog({ exercises: [entry("one")] })

    const exercise = SnippetCatalog.load(directory).get("one")

    expect(Object.isFrozen(exercise)).toBe(true)
    expect(Object.isFrozen(exercise.checks)).toBe(true)
    expect(exercise.sql).toBe("CREATE TABLE one (id INT);")
  })
})

describe("catalogs built in memory", () => {
  it("should keep the declaration order", () => {
    const catalog = SnippetCatalog.fromExercises([
      createExercise({ name: "b" }),
      createExercise({ name: "a" }),
    ])

    expect(catalog.all().map((e) => e.name)).toEqual(["b", "a"])
    expect(catalog.get("a").name).toBe("a")
  })

  it("should freeze its own copy and leave the caller's exercise alone", () => {
    const checks = [
      { kind: "accepts" as const, description: "insert", sql: "INSERT 1" },
    ]
    const exercise = createExercise({ checks })

    const stored = SnippetCatalog.fromExercises([exercise]).get("sample")
    checks.push({ kind: "accepts", description: "later", sql: "INSERT 2" })

    expect(Object.isFrozen(checks)).toBe(false)
    expect(Object.isFrozen(checks[0])).toBe(false)
    expect(Object.isFrozen(stored.checks)).toBe(true)
    expect(stored.checks.map((c) => c.description)).toEqual(["insert"])
  })

  it("should reject duplicates", () => {
    expect(() =>
      SnippetCatalog.fromExercises([
        createExercise({ name: "a" }),
        createExercise({ name: "a" }),
      ]),
    ).toThrow(CatalogError)
  })
})
