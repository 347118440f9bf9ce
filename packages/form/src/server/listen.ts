import type { EventEmitter } from "node:events"
import type { AddressInfo } from "node:net"
import { serve } from "@hono/node-server"
import { type HostPort, parseHostPort } from "@mailrelay/protocol"
import type { Hono } from "hono"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => void
}

export type BoundServer = {
  server: Closeable
  address: HostPort
}

type IdleTimeout = { setTimeout: (msecs: number) => unknown }

export type ListenOptions = {
  /**
   * Deadline for a request to arrive in full, headers included. A socket idle for as
   * long, while reading or writing, is destroyed.
   */
  timeoutMs: number
}

/** Serves `app` on `address` (`host:port`); resolves once the socket is bound. */
export function listen(app: Hono, address: string, options: ListenOptions): Promise<BoundServer> {
  const { host, port } = parseHostPort(address)
  const { timeoutMs } = options

  return new Promise<BoundServer>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port,
        ...(host && { hostname: host }),
        serverOptions: {
          requestTimeout: timeoutMs,
          headersTimeout: timeoutMs,
          // request deadlines are only checked this often
          connectionsCheckingInterval: Math.min(timeoutMs, 30_000),
        },
      },
      (info: AddressInfo) => {
        events.off("error", reject)
        resolve({ server, address: { host: info.address, port: info.port } })
      },
    )
    const events: EventEmitter = server
    const sockets: IdleTimeout = server

    events.once("error", reject)
    sockets.setTimeout(timeoutMs)
  })
}

export type ListenFn = typeof listen

export function closeServer(server: Closeable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
  })
}
