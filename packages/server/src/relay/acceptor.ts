import type net from "node:net"
import type { Logger } from "@mailrelay/logger"
import { ListenerClosedError } from "../net/listener-closed-error"
import type { TcpListener } from "../net/tcp-listener"

export type AcceptorDeps = {
  listener: Pick<TcpListener, "accept">
  logger: Logger
  /** Starts handling a connection. Must not wait for the handling to finish. */
  dispatch: (socket: net.Socket) => void
}

/**
 * Accept loop. Returns once `signal` aborts or the listener closes; any other accept
 * failure is logged and the loop carries on.
 */
export async function runAcceptor(deps: AcceptorDeps, signal: AbortSignal): Promise<void> {
  const logger = deps.logger.child({ module: "acceptor" })

  while (!signal.aborted) {
    let socket: net.Socket

    try {
      socket = await deps.listener.accept(signal)
    } catch (err) {
      if (signal.aborted || err instanceof ListenerClosedError) {
        logger.debug("Acceptor stopped")
        return
      }

      logger.error("Failed to accept connection", { err })
      continue
    }

    deps.dispatch(socket)
  }

  logger.debug("Acceptor stopped")
}
