import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One entry as written by the adapter under test. */
export type CapturedLog = {
  level: LogLevelName
  payload: Record<string, unknown>
}

/** Builds a fresh logger whose output can be read back. */
export type LoggerHarness = {
  name: string
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => CapturedLog[]
    clear: () => void
  }
}

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const connection = logger.child({ connectionId: "c-1" })
      const delivery = connection.child({ recipient: "a@b.com" })

      delivery.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        connectionId: "c-1",
        recipient: "a@b.com",
        msg: "hello",
      })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ generation: 1 }).child({ generation: 2 })

      child.info("hello")

      expect(read()[0]?.payload.generation).toBe(2)
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ connectionId: "c-1" })
      const child = parent.child({ attempt: 1 })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("attempt")
      expect(logs[1]?.payload).toMatchObject({ connectionId: "c-1", attempt: 1 })
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ connectionId: "c-1" }).warn("slow", { durationMs: 42 })

      expect(read()[0]?.payload).toMatchObject({ connectionId: "c-1", durationMs: 42 })
    })

    it("serializes errors passed under err with their cause", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.error("failed", {
        err: new Error("send failed", { cause: new Error("ECONNRESET") }),
      })

      const err = read()[0]?.payload.err

      expect(err).toMatchObject({ type: "Error", message: expect.stringContaining("send failed") })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
