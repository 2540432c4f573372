import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

/** Builds a fresh adapter instance that records what it emits. */
export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
  }
}

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ path: "/etc/hostmon/hostmon.conf" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "config",
        path: "/etc/hostmon/hostmon.conf",
      })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "merge" }).child({ module: "migrate" })

      child.info("hello")

      expect(read()[0]?.payload.module).toBe("migrate")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "config" })
      const child = parent.child({ key: "interval" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("key")
      expect(logs[1]?.payload).toMatchObject({ module: "config", key: "interval" })
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "validate" }).warn("clamped", { key: "on_http_5xx_retries" })

      expect(read()[0]?.payload).toMatchObject({
        module: "validate",
        key: "on_http_5xx_retries",
      })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
