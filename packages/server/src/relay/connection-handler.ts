import { randomUUID } from "node:crypto"
import type net from "node:net"
import type { Logger } from "@mailrelay/logger"
import { type EmailRequest, formatHostPort, readRequest } from "@mailrelay/protocol"
import type { RelayConfig } from "../config/relay-config"
import type { SnapshotLease } from "../runtime/snapshot-store"
import { withDeadline } from "./deadline"
import type { DeliveryEngine } from "./delivery-engine"

export type ConnectionHandlerDeps = {
  engine: DeliveryEngine
  /** Takes the configuration snapshot the connection runs under. */
  acquire: () => SnapshotLease
}

/**
 * Reads one request from the socket and delivers it, then closes the socket. Nothing is
 * ever written back. The snapshot taken on arrival is used for the whole connection.
 */
export class ConnectionHandler {
  constructor(private readonly deps: ConnectionHandlerDeps) {}

  async handle(socket: net.Socket, signal: AbortSignal): Promise<void> {
    const lease = this.deps.acquire()
    const { config } = lease.snapshot
    const logger = lease.snapshot.logger.child({
      module: "connection",
      connectionId: randomUUID(),
      remoteAddr: remoteAddress(socket),
    })

    socket.on("error", (err) => logger.debug("Connection error", { err }))

    try {
      logger.debug("New connection received")

      const request = await this.decode(socket, config, signal, logger)
      if (!request) return

      logger.info("Processing email request", {
        recipient: request.recipient,
        bytes: request.body.length,
      })

      const deadline = withDeadline(signal, config.server.timeoutMs)
      try {
        await this.deps.engine.deliver(request, config, { signal: deadline.signal, logger })
      } finally {
        deadline.dispose()
      }
    } finally {
      socket.destroy()
      lease.release()
    }
  }

  private async decode(
    socket: net.Socket,
    config: RelayConfig,
    signal: AbortSignal,
    logger: Logger,
  ): Promise<EmailRequest | undefined> {
    try {
      return await readRequest(socket, {
        maxBytes: config.server.maxRequestBytes,
        timeoutMs: config.server.timeoutMs,
        signal,
      })
    } catch (err) {
      logger.error("Failed to decode email request", { err })
      return undefined
    }
  }
}

function remoteAddress(socket: net.Socket): string {
  if (socket.remoteAddress === undefined || socket.remotePort === undefined) return "unknown"

  return formatHostPort({ host: socket.remoteAddress, port: socket.remotePort })
}
