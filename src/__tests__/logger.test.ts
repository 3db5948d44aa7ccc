import { afterEach, describe, it, expect, vi } from "vitest"
import winston from "winston"

// 绕过 setup.ts 中的全局 mock，检查真实 logger
const { default: logger, LOG_LEVELS, setLogLevel } = await vi.importActual<typeof import("../config/logger")>(
  "../config/logger",
)

const MESSAGE = Symbol.for("message")

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info")
  })

  it("writes through a single console transport", () => {
    expect(logger.transports).toHaveLength(1)
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console)
  })

  it("routes every level to stderr so stdout stays free for the stdio transport", () => {
    const transport = logger.transports[0]
    if (!(transport instanceof winston.transports.Console)) throw new Error("expected a console transport")

    expect(Object.keys(transport.stderrLevels).sort()).toEqual([...LOG_LEVELS].sort())
  })

  it("formats lines as timestamp [LEVEL]: message", () => {
    const info = logger.format.transform({ level: "warn", message: "disk low", [Symbol.for("level")]: "warn" })
    if (typeof info === "boolean") throw new Error("expected the format to keep the entry")

    expect(info[MESSAGE]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[WARN\]: disk low$/)
  })

  it("changes the level with setLogLevel", () => {
    expect(logger.level).toBe("info")

    setLogLevel("debug")

    expect(logger.level).toBe("debug")
  })
})
