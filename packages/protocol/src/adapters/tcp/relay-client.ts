import net from "node:net"
import { formatHostPort, parseHostPort } from "../../core/address"
import { type EmailRequest, encodeEmailRequest } from "../../core/email-request"
import { RelayClientError, type RelayClientStage } from "./relay-client-error"

export type RelayClientOptions = {
  /** Relay address, `host:port`. */
  address: string

  /** @default 30_000 */
  connectTimeoutMs?: number

  /** Deadline for the request to be handed to the kernel. @default 5_000 */
  writeTimeoutMs?: number

  /** Terminate the object with a newline. @default true */
  newline?: boolean
}

export type RelayRequest = Pick<EmailRequest, "recipient" | "subject"> & { body: Buffer | string }

/**
 * Fire-and-forget sender: one connection per request, no acknowledgement is read back.
 */
export class RelayClient {
  private readonly address: string
  private readonly connectTimeoutMs: number
  private readonly writeTimeoutMs: number
  private readonly newline: boolean

  constructor(options: RelayClientOptions) {
    this.address = formatHostPort(parseHostPort(options.address))
    this.connectTimeoutMs = options.connectTimeoutMs ?? 30_000
    this.writeTimeoutMs = options.writeTimeoutMs ?? 5_000
    this.newline = options.newline ?? true
  }

  async send(request: RelayRequest): Promise<void> {
    const payload = encodeEmailRequest(request, { newline: this.newline })
    const socket = await this.connect()

    try {
      await this.step(socket, "write", this.writeTimeoutMs, (done) => {
        socket.end(payload, done)
      })
    } finally {
      socket.destroy()
    }
  }

  private async connect(): Promise<net.Socket> {
    const { host, port } = parseHostPort(this.address)
    const socket = net.createConnection({ port, ...(host && { host }) })

    try {
      await this.step(socket, "connect", this.connectTimeoutMs, (done) => {
        socket.once("connect", done)
      })
    } catch (err) {
      socket.destroy()
      throw err
    }

    return socket
  }

  /** Runs `start`, settling on its callback, a socket error, or the deadline. */
  private step(
    socket: net.Socket,
    stage: RelayClientStage,
    timeoutMs: number,
    start: (done: () => void) => void,
  ): Promise<void> {
    const context = { address: this.address, stage }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.off("error", onError)
        reject(new RelayClientError(`${stage} to ${this.address} timed out`, context))
      }, timeoutMs)

      const onError = (err: Error): void => {
        clearTimeout(timer)
        reject(new RelayClientError(`${stage} to ${this.address} failed`, context, err))
      }

      socket.once("error", onError)

      start(() => {
        clearTimeout(timer)
        socket.off("error", onError)
        resolve()
      })
    })
  }
}
