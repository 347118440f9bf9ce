import { once } from "node:events"
import { mkdir } from "node:fs/promises"
import path from "node:path"
import pino from "pino"
import pinoRoll from "pino-roll"
import type { LogSink } from "../../ports/log-sink"
import type { LogSinkOptions } from "../../ports/logger-options"

export type PinoLogSinkOptions = LogSinkOptions & {
  /**
   * Called for write errors after the sink has opened.
   *
   * @default writes a line to stderr
   */
  onError?: (err: Error) => void
}

type SonicBoom = ReturnType<typeof pino.destination>

/**
 * A pino destination stream (SonicBoom) opened on a file, stdout or stderr.
 *
 * Files are `<directory>/<name>.<n>.log`, opened through pino-roll, written asynchronously
 * with `bufferSize` bytes of buffering and rolled over at `maxFileSizeKb`. stdout and
 * stderr are written synchronously so nothing is left behind on exit.
 */
export class PinoLogSink implements LogSink {
  private ready = false
  private closing: Promise<void> | undefined

  private constructor(
    readonly stream: SonicBoom,
    private readonly toFile: boolean,
    opts: PinoLogSinkOptions,
  ) {
    this.stream.once("ready", () => {
      this.ready = true
    })

    const onError = opts.onError ?? reportToStderr
    this.stream.on("error", (err: Error) => {
      if (this.ready) onError(err)
    })
  }

  /** Opens the sink and waits until the destination is writable. Rejects if it cannot be opened. */
  static async open(opts: PinoLogSinkOptions): Promise<PinoLogSink> {
    const toFile = opts.target === "file"
    const stream = toFile
      ? await openRollingFile(opts)
      : pino.destination({ dest: opts.target === "stderr" ? 2 : 1, sync: true })
    const sink = new PinoLogSink(stream, toFile, opts)

    await sink.whenReady()

    return sink
  }

  async flush(): Promise<void> {
    if (this.closing) return this.closing
    if (!this.toFile) return

    await this.whenReady()

    await new Promise<void>((resolve, reject) => {
      this.stream.flush((err) => (err ? reject(err) : resolve()))
    })
  }

  close(): Promise<void> {
    this.closing ??= this.end()

    return this.closing
  }

  private async end(): Promise<void> {
    await this.whenReady()

    const closed = once(this.stream, "close")
    this.stream.end()

    await closed
  }

  private async whenReady(): Promise<void> {
    if (this.ready) return

    await once(this.stream, "ready")
  }
}

function reportToStderr(err: Error): void {
  process.stderr.write(`log sink write failed: ${err.message}\n`)
}

async function openRollingFile(opts: LogSinkOptions): Promise<SonicBoom> {
  const { directory, maxFileSizeKb, maxFiles } = opts

  if (!directory) {
    throw new Error("A log directory is required when logging to a file")
  }

  await mkdir(directory, { recursive: true })

  return pinoRoll({
    file: path.join(directory, opts.name),
    extension: ".log",
    minLength: opts.bufferSize ?? 0,
    sync: false,
    ...(maxFileSizeKb !== undefined && { size: `${maxFileSizeKb}k` }),
    ...(maxFileSizeKb !== undefined &&
      maxFiles !== undefined && { limit: { count: Math.max(maxFiles - 1, 1) } }),
  })
}

export function openLogSink(opts: PinoLogSinkOptions): Promise<PinoLogSink> {
  return PinoLogSink.open(opts)
}
