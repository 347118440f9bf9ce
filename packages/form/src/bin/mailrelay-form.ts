#!/usr/bin/env -S npx tsx
import { SystemClock } from "@mailrelay/clock"
import { createPinoLogger, openLogSink } from "@mailrelay/logger"
import { createFormServer } from "../server/form-server"

const NAME = "mailrelay-form"

export async function run(): Promise<void> {
  const sink = await openLogSink({ target: "stderr", name: NAME })
  const logger = createPinoLogger(
    { destination: sink.stream },
    { level: "info" },
    { service: NAME, module: "bootstrap" },
  )

  const server = createFormServer({ clock: new SystemClock(), logger }, { name: NAME })

  try {
    await server.start()
  } catch (err) {
    logger.fatal("Failed to start contact form service", { err })
    process.exit(1)
  }

  server.setupProcessHandlers()
}

run().catch((err: unknown) => {
  process.stderr.write(`${NAME}: ${err instanceof Error ? err.message : String(err)}\n`)
  process.exit(1)
})
