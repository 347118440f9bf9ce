import { PassThrough } from "node:stream"
import { readRequest } from "../read-request"
import type { RequestDecodeError } from "../request-decode-error"

const options = { maxBytes: 1024, timeoutMs: 1_000 }

async function reason(promise: Promise<unknown>): Promise<string> {
  const err: RequestDecodeError = await promise.then(
    () => {
      throw new Error("expected a decode failure")
    },
    (e: RequestDecodeError) => e,
  )

  return err.reason
}

describe("readRequest", () => {
  let stream: PassThrough

  beforeEach(() => {
    stream = new PassThrough()
  })

  it("decodes an object terminated by a newline", async () => {
    const read = readRequest(stream, options)
    stream.write('{"recipient":"a@b.com","subject":"hi","body":"aGVsbG8="}\n')

    const request = await read

    expect(request.recipient).toBe("a@b.com")
    expect(request.subject).toBe("hi")
    expect(request.body.toString()).toBe("hello")
  })

  it("decodes an object split across chunks without a trailing newline", async () => {
    const read = readRequest(stream, options)
    stream.write('  \n{"recipient":"a@b.com",')
    stream.write(String.raw`"subject":"a } \" {","body":""}`)

    await expect(read).resolves.toEqual({
      recipient: "a@b.com",
      subject: 'a } " {',
      body: Buffer.alloc(0),
    })
  })

  it("leaves bytes after the object unread", async () => {
    const read = readRequest(stream, options)
    stream.write('{"recipient":"first"}{"recipient":"second"}')

    await expect(read).resolves.toMatchObject({ recipient: "first" })
    expect(stream.isPaused()).toBe(true)
    expect(String(stream.read())).toBe('{"recipient":"second"}')
  })

  it("fails with empty when the stream ends before any object", async () => {
    const read = readRequest(stream, options)
    stream.end()

    await expect(reason(read)).resolves.toBe("empty")
  })

  it("fails with truncated when the stream ends mid-object", async () => {
    const read = readRequest(stream, options)
    stream.end('{"recipient":')

    await expect(reason(read)).resolves.toBe("truncated")
  })

  it("fails with invalid_json for malformed JSON", async () => {
    const read = readRequest(stream, options)
    stream.write('{"recipient": nope}')

    await expect(reason(read)).resolves.toBe("invalid_json")
  })

  it("fails with invalid_json when the payload is not an object", async () => {
    const read = readRequest(stream, options)
    stream.write('["a@b.com"]')

    await expect(reason(read)).resolves.toBe("invalid_json")
  })

  it("fails with invalid_request for fields of the wrong type", async () => {
    const read = readRequest(stream, options)
    stream.write('{"subject":42}')

    await expect(reason(read)).resolves.toBe("invalid_request")
  })

  it("fails with too_large past maxBytes", async () => {
    const read = readRequest(stream, { ...options, maxBytes: 16 })
    stream.write(`{"recipient":"${"x".repeat(32)}"}`)

    await expect(reason(read)).resolves.toBe("too_large")
  })

  it("fails with timeout when the object does not arrive in time", async () => {
    const read = readRequest(stream, { ...options, timeoutMs: 20 })
    stream.write('{"recipient":')

    await expect(reason(read)).resolves.toBe("timeout")
  })

  it("fails with aborted when the signal fires", async () => {
    const controller = new AbortController()
    const read = readRequest(stream, { ...options, signal: controller.signal })

    controller.abort()

    await expect(reason(read)).resolves.toBe("aborted")
  })

  it("fails immediately for an already aborted signal", async () => {
    await expect(
      reason(readRequest(stream, { ...options, signal: AbortSignal.abort() })),
    ).resolves.toBe("aborted")
  })

  it("fails with io on a stream error", async () => {
    const read = readRequest(stream, options)
    stream.destroy(new Error("ECONNRESET"))

    await expect(reason(read)).resolves.toBe("io")
  })
})
