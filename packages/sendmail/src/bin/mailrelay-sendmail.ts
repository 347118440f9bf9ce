#!/usr/bin/env -S npx tsx
import { runSendmail } from "../cli/run"

runSendmail({
  argv: process.argv.slice(2),
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`mailrelay-sendmail: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
