import { Writable } from "stream"
import {
  ConsoleLogWriter,
  DefaultLogger,
  LogLevel,
  SimpleLogFormatter,
  parseLogLevel,
  type LogData,
  type LogWriter,
} from "./logging.js"

class MemoryWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }
}

describe("logging", () => {
  it("should only write entries at or above the configured level", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({
      name: "test",
      level: LogLevel.WARN,
      writer,
    })

    logger.debug("hidden")
    logger.info("hidden")
    logger.warn("shown")
    logger.error("shown")
    logger.fatal("shown")

    expect(writer.entries.map((e) => e.level)).toEqual([
      LogLevel.WARN,
      LogLevel.ERROR,
      LogLevel.FATAL,
    ])
    expect(writer.entries[0].source).toBe("test")
  })

  it("should rebind the level methods when the level changes", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({ level: LogLevel.ERROR, writer })

    logger.debug("before")
    logger.setLevel(LogLevel.DEBUG)
    logger.debug("after", { attempt: 2 })

    expect(logger.level).toBe(LogLevel.DEBUG)
    expect(writer.entries).toHaveLength(1)
    expect(writer.entries[0].message).toBe("after")
    expect(writer.entries[0].context).toEqual({ attempt: 2 })
  })

  it("should format entries with their source and context", () => {
    expect(
      SimpleLogFormatter({
        level: LogLevel.INFO,
        message: "connected",
        source: "postgres",
      }),
    ).toBe("(postgres) INFO - connected")

    expect(
      SimpleLogFormatter({
        level: LogLevel.ERROR,
        message: "failed",
        context: new TypeError("bad value"),
      }),
    ).toBe("ERROR - failed (TypeError: bad value)")

    expect(
      SimpleLogFormatter({
        level: LogLevel.DEBUG,
        message: "state",
        context: { count: 3 },
      }),
    ).toBe("DEBUG - state { count: 3 }")
  })

  it("should write formatted lines to the stream", () => {
    const lines: string[] = []
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString())
        callback()
      },
    })
    const writer = new ConsoleLogWriter((data) => data.message, stream)

    writer.log({ level: LogLevel.WARN, message: "careful" })

    expect(lines).toEqual(["careful\n"])
  })

  it("should parse level names", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG)
    expect(parseLogLevel(" Warning ")).toBe(LogLevel.WARN)
    expect(parseLogLevel("FATAL")).toBe(LogLevel.FATAL)
    expect(parseLogLevel("verbose")).toBeUndefined()
  })
})
