#!/usr/bin/env -S npx tsx
import { SystemClock } from "@mailrelay/clock"
import { SmtpTransport } from "@mailrelay/email"
import { createPinoLogger, openLogSink } from "@mailrelay/logger"
import { createRelayServer } from "../server/relay-server"

const NAME = "mailrelayd"

export async function run(): Promise<void> {
  const sink = await openLogSink({ target: "stderr", name: NAME })
  const logger = createPinoLogger(
    { destination: sink.stream },
    { level: "info" },
    { service: NAME, module: "bootstrap" },
  )

  const server = createRelayServer(
    { clock: new SystemClock(), transport: new SmtpTransport(), logger },
    { name: NAME },
  )

  try {
    await server.start()
  } catch (err) {
    logger.fatal("Failed to start mail relay", { err })
    process.exit(1)
  }

  server.setupProcessHandlers()
}

run().catch((err: unknown) => {
  process.stderr.write(`${NAME}: ${err instanceof Error ? err.message : String(err)}\n`)
  process.exit(1)
})
