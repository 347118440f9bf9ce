import { Readable, Writable } from "node:stream"
import type { SendmailIo } from "../cli/run"

export type CapturedIo = SendmailIo & {
  out(): string
  err(): string
}

function capture(): { stream: Writable; read(): string } {
  let text = ""
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })

  return { stream, read: () => text }
}

/** In-memory stdio for one run; `input` becomes stdin. */
export function captureIo(argv: string[], input: string | Buffer | Readable = ""): CapturedIo {
  const stdout = capture()
  const stderr = capture()

  return {
    argv,
    stdin: input instanceof Readable ? input : Readable.from([Buffer.from(input)]),
    stdout: stdout.stream,
    stderr: stderr.stream,
    env: {},
    out: stdout.read,
    err: stderr.read,
  }
}
