import {
  environmentOverrides,
  loadRunnerConfiguration,
  toPostgresConfiguration,
} from "./config.js"

describe("runner configuration", () => {
  it("should apply defaults", () => {
    expect(loadRunnerConfiguration()).toEqual({
      database: {
        host: "localhost",
        port: 5432,
        connectTimeoutMs: 10_000,
      },
      logLevel: "warn",
      format: "text",
      verbose: false,
      metrics: false,
    })
  })

  it("should read the environment", () => {
    const config = loadRunnerConfiguration({
      env: {
        PGHOST: "db",
        PGPORT: "6543",
        PGUSER: "drill",
        PGPASSWORD: "test-secret",
        PGDATABASE: "exercises",
        DRILL_CONNECT_TIMEOUT_MS: "2500",
        DRILL_LOG_LEVEL: "DEBUG",
        DRILL_METRICS: "true",
        DRILL_CATALOG: "/srv/catalog",
      },
    })

    expect(config.database).toEqual({
      host: "db",
      port: 6543,
      user: "drill",
      password: "test-secret",
      database: "exercises",
      connectTimeoutMs: 2500,
    })
    expect(config.logLevel).toBe("debug")
    expect(config.metrics).toBe(true)
    expect(config.catalogDirectory).toBe("/srv/catalog")
  })

  it("should let the command line win over the environment", () => {
    const config = loadRunnerConfiguration({
      env: { DRILL_LOG_LEVEL: "info", DRILL_CATALOG: "/from/env" },
      overrides: { logLevel: "error", catalogDirectory: undefined },
    })

    expect(config.logLevel).toBe("error")
    expect(config.catalogDirectory).toBe("/from/env")
  })

  it("should reject invalid values", () => {
    expect(() =>
      loadRunnerConfiguration({ env: { PGPORT: "not-a-port" } }),
    ).toThrow("database.port: Expected number, received nan")
    expect(() =>
      loadRunnerConfiguration({ overrides: { format: "xml" } }),
    ).toThrow("format: Invalid enum value. Expected 'text' | 'json', received 'xml'")
  })

  it("should leave unset variables out", () => {
    expect(environmentOverrides({})).toEqual({ database: {} })
  })

  it("should translate the database section for the client", () => {
    expect(
      toPostgresConfiguration({
        connectionString: "postgres://localhost/drill",
        host: "localhost",
        port: 5432,
        connectTimeoutMs: 1000,
      }),
    ).toEqual({
      connectionString: "postgres://localhost/drill",
      host: "localhost",
      port: 5432,
      connectionTimeout: 1000,
    })
  })
})
