import { RequestDecodeError } from "./request-decode-error"

const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d
const QUOTE = 0x22
const BACKSLASH = 0x5c
const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0d])

/**
 * Finds the end of one top-level JSON object in a byte stream without parsing it.
 * Leading whitespace is skipped; braces inside strings are ignored.
 */
export class ObjectScanner {
  private readonly chunks: Buffer[] = []
  private length = 0
  private depth = 0
  private inString = false
  private escaped = false

  constructor(private readonly maxBytes: number) {}

  get started(): boolean {
    return this.depth > 0 || this.length > 0
  }

  /**
   * Feed the next chunk. Returns the offset just past the closing brace when the object
   * is complete, or -1 when more input is needed.
   *
   * @throws RequestDecodeError `invalid_json` when the first byte is not `{`,
   * `too_large` when the object outgrows `maxBytes`.
   */
  push(chunk: Buffer): number {
    let start = this.started ? 0 : -1

    for (const [i, byte] of chunk.entries()) {
      if (start === -1) {
        if (WHITESPACE.has(byte)) continue
        if (byte !== OPEN_BRACE) {
          throw new RequestDecodeError("invalid_json", "request must be a JSON object")
        }
        start = i
        this.depth = 1
        continue
      }

      if (this.inString) {
        if (this.escaped) this.escaped = false
        else if (byte === BACKSLASH) this.escaped = true
        else if (byte === QUOTE) this.inString = false
        continue
      }

      if (byte === QUOTE) this.inString = true
      else if (byte === OPEN_BRACE) this.depth++
      else if (byte === CLOSE_BRACE && --this.depth === 0) {
        this.append(chunk.subarray(start, i + 1))
        return i + 1
      }
    }

    if (start !== -1) this.append(chunk.subarray(start))

    return -1
  }

  text(): string {
    return Buffer.concat(this.chunks, this.length).toString("utf8")
  }

  private append(piece: Buffer): void {
    if (this.length + piece.length > this.maxBytes) {
      throw new RequestDecodeError(
        "too_large",
        `request exceeds ${this.maxBytes} bytes`,
      )
    }

    this.chunks.push(piece)
    this.length += piece.length
  }
}
