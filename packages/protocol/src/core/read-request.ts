import type { Readable } from "node:stream"
import { type EmailRequest, parseEmailRequest } from "./email-request"
import { ObjectScanner } from "./object-scanner"
import { RequestDecodeError } from "./request-decode-error"

export type ReadRequestOptions = {
  /** Largest accepted object, in bytes. */
  maxBytes: number

  /** Deadline for the whole object to arrive. */
  timeoutMs: number

  /** Stops the read; the promise rejects with reason `aborted`. */
  signal?: AbortSignal
}

/**
 * Read exactly one JSON object from `stream` and decode it as an EmailRequest.
 *
 * Reading stops at the object's closing brace: the stream is paused and any bytes that
 * arrived after the object are pushed back unread. A trailing newline is not required.
 *
 * @throws RequestDecodeError for every failure, with `reason` telling which.
 */
export function readRequest(stream: Readable, options: ReadRequestOptions): Promise<EmailRequest> {
  const { maxBytes, timeoutMs, signal } = options

  return new Promise<EmailRequest>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestDecodeError("aborted", "request read aborted", signal.reason))
      return
    }

    const scanner = new ObjectScanner(maxBytes)
    let settled = false

    const settle = (): boolean => {
      if (settled) return false
      settled = true

      clearTimeout(timer)
      stream.off("data", onData)
      stream.off("end", onEnd)
      stream.off("close", onEnd)
      stream.off("error", onError)
      signal?.removeEventListener("abort", onAbort)
      stream.pause()

      return true
    }

    const fail = (err: RequestDecodeError): void => {
      if (settle()) reject(err)
    }

    const onData = (chunk: Buffer | string): void => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk
      let end: number

      try {
        end = scanner.push(bytes)
      } catch (err) {
        if (err instanceof RequestDecodeError) fail(err)
        else fail(new RequestDecodeError("io", "failed to scan request", err))
        return
      }

      if (end === -1 || !settle()) return

      if (end < bytes.length) stream.unshift(bytes.subarray(end))

      try {
        resolve(decode(scanner.text()))
      } catch (err) {
        reject(err)
      }
    }

    const onEnd = (): void => {
      fail(
        scanner.started
          ? new RequestDecodeError("truncated", "connection closed before the request ended")
          : new RequestDecodeError("empty", "connection closed without a request"),
      )
    }

    const onError = (err: Error): void => {
      fail(new RequestDecodeError("io", "failed to read request", err))
    }

    const onAbort = (): void => {
      fail(new RequestDecodeError("aborted", "request read aborted", signal?.reason))
    }

    const timer = setTimeout(() => {
      fail(new RequestDecodeError("timeout", `no complete request within ${timeoutMs}ms`))
    }, timeoutMs)

    stream.on("data", onData)
    stream.once("end", onEnd)
    stream.once("close", onEnd)
    stream.once("error", onError)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

function decode(text: string): EmailRequest {
  let value: unknown

  try {
    value = JSON.parse(text)
  } catch (err) {
    throw new RequestDecodeError("invalid_json", "request is not valid JSON", err)
  }

  return parseEmailRequest(value)
}
