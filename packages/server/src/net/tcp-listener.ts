import net from "node:net"
import { type HostPort, parseHostPort } from "@mailrelay/protocol"
import { ListenerClosedError } from "./listener-closed-error"

type Queued = {
  socket: net.Socket
  onError: () => void
}

type Waiter = {
  resolve: (socket: net.Socket) => void
  reject: (err: unknown) => void
}

/**
 * Pull-based wrapper over `net.Server`: connections queue up until `accept()` takes them.
 * Server errors after binding (e.g. EMFILE) are handed to the next `accept()` call.
 */
export class TcpListener {
  private readonly server: net.Server
  private readonly pending: Queued[] = []
  private readonly errors: Error[] = []
  private readonly waiters: Waiter[] = []
  private bound = false
  private closed = false

  constructor() {
    this.server = net.createServer((socket) => this.onConnection(socket))
    this.server.on("error", (err) => this.onError(err))
  }

  /** Binds `host:port`. Rejects when the address cannot be bound. */
  listen(address: string): Promise<void> {
    if (this.bound || this.closed) {
      return Promise.reject(new Error("listener already used"))
    }

    const { host, port } = parseHostPort(address)

    return new Promise<void>((resolve, reject) => {
      const onListenError = (err: Error): void => reject(err)

      this.server.once("error", onListenError)
      this.server.listen({ port, ...(host && { host }) }, () => {
        this.server.off("error", onListenError)
        this.bound = true
        resolve()
      })
    })
  }

  address(): HostPort {
    const info = this.server.address()

    if (info === null || typeof info === "string") {
      throw new Error("listener is not bound to a TCP address")
    }

    return { host: info.address, port: info.port }
  }

  /**
   * Next connection. Rejects with ListenerClosedError once closed, with the signal's reason
   * when aborted, or with a server error.
   */
  accept(signal?: AbortSignal): Promise<net.Socket> {
    if (this.closed) return Promise.reject(new ListenerClosedError())
    if (signal?.aborted) return Promise.reject(signal.reason)

    const error = this.errors.shift()
    if (error) return Promise.reject(error)

    const queued = this.pending.shift()
    if (queued) {
      queued.socket.off("error", queued.onError)
      return Promise.resolve(queued.socket)
    }

    return new Promise<net.Socket>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter)
        if (index !== -1) this.waiters.splice(index, 1)
        reject(signal?.reason)
      }

      const waiter: Waiter = {
        resolve: (s) => {
          signal?.removeEventListener("abort", onAbort)
          resolve(s)
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort)
          reject(err)
        },
      }

      this.waiters.push(waiter)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  /**
   * Stops listening. Connections already handed out are not touched; queued ones are
   * destroyed and waiting `accept()` calls reject.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    for (const { socket } of this.pending.splice(0)) socket.destroy()
    for (const waiter of this.waiters.splice(0)) waiter.reject(new ListenerClosedError())

    if (this.server.listening) this.server.close()
  }

  private onConnection(socket: net.Socket): void {
    if (this.closed) {
      socket.destroy()
      return
    }

    const waiter = this.waiters.shift()

    if (waiter) {
      waiter.resolve(socket)
      return
    }

    // a queued socket has no owner yet to take its errors
    const queued: Queued = {
      socket,
      onError: () => {
        const index = this.pending.indexOf(queued)
        if (index !== -1) this.pending.splice(index, 1)
        socket.destroy()
      },
    }

    socket.once("error", queued.onError)
    this.pending.push(queued)
  }

  private onError(err: Error): void {
    if (!this.bound) return

    const waiter = this.waiters.shift()

    if (waiter) waiter.reject(err)
    else this.errors.push(err)
  }
}

export type CreateListenerFn = () => TcpListener

export const createTcpListener: CreateListenerFn = () => new TcpListener()
