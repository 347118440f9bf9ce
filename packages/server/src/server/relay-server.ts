import type { Clock } from "@mailrelay/clock"
import type { MailTransport } from "@mailrelay/email"
import type { Logger } from "@mailrelay/logger"
import { formatHostPort, type HostPort } from "@mailrelay/protocol"
import { createRetryExecutor } from "@mailrelay/retry"
import {
  type LoadRelayConfigFn,
  type LoadRelayConfigOptions,
  loadRelayConfig,
} from "../config/load-relay-config"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type CreateListenerFn, createTcpListener, type TcpListener } from "../net/tcp-listener"
import { runAcceptor } from "../relay/acceptor"
import { ConnectionHandler } from "../relay/connection-handler"
import { ConnectionTracker } from "../relay/connection-tracker"
import { DeliveryEngine } from "../relay/delivery-engine"
import { type OpenLoggingFn, openLogging } from "../runtime/logging"
import { type RelaySnapshot, SnapshotStore } from "../runtime/snapshot-store"

export type RelayServerState = "idle" | "starting" | "running" | "stopping" | "stopped"

export interface RelayServerDeps {
  clock: Clock
  transport: MailTransport
  /** Logs until the configured logger is open, and whatever fails before that. */
  logger: Logger
}

export interface RelayServerOptions {
  /** Program name; selects the default config file and log name. */
  name: string

  /** @default MAILRELAY_CONFIG_FILE, else /usr/local/etc/<name>/<name>.json */
  file?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default process.cwd() */
  cwd?: string

  /** Applied on top of every load, including reloads. */
  overrides?: Record<string, unknown>

  /**
   * Deadline for flushing logs once connections are drained.
   * @default 5_000
   */
  flushTimeoutMs?: number
}

export interface RelayServerCollaborators {
  loadConfig: LoadRelayConfigFn
  openLogging: OpenLoggingFn
  createListener: CreateListenerFn
  shutdown: ShutdownFn
  setupProcessHandlers: SetupProcessHandlersFn
}

const defaultCollaborators: RelayServerCollaborators = {
  loadConfig: loadRelayConfig,
  openLogging,
  createListener: createTcpListener,
  shutdown,
  setupProcessHandlers,
}

type Running = {
  file: string
  store: SnapshotStore
  listener: TcpListener
  controller: AbortController
  tracker: ConnectionTracker
  acceptor: Promise<void>
}

/**
 * The relay process: accepts one request per connection on `server.internalAddr` and
 * delivers each through the transport. Configuration is swapped whole on reload.
 */
export class RelayServer {
  private state: RelayServerState = "idle"
  private running?: Running
  private signalHandler?: SignalHandler
  private reloading: Promise<void> = Promise.resolve()
  private stopping?: Promise<StopResult>
  private readonly engine: DeliveryEngine

  constructor(
    private readonly deps: RelayServerDeps,
    private readonly options: RelayServerOptions,
    private readonly collabs: RelayServerCollaborators = defaultCollaborators,
  ) {
    this.engine = new DeliveryEngine({
      transport: deps.transport,
      retryExecutor: createRetryExecutor({ clock: deps.clock }),
    })
  }

  /** The configured logger once started, the bootstrap logger before. */
  get logger(): Logger {
    return this.running?.store.logger ?? this.deps.logger
  }

  get snapshot(): RelaySnapshot {
    return this.requireRunning().store.snapshot
  }

  getState(): RelayServerState {
    return this.state
  }

  address(): HostPort {
    return this.requireRunning().listener.address()
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.logger,
      stop: () => this.stop(),
      reload: () => this.reload(),
    })

    return this
  }

  /**
   * Loads configuration (writing the defaults when the file is missing), opens the log
   * sink and binds the listener. Rejects when any of these fails.
   */
  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error("Relay server already started")
    }

    this.state = "starting"

    let running: Running

    try {
      running = await this.open()
    } catch (err) {
      this.state = "idle"
      throw err
    }

    this.running = running
    this.state = "running"

    const { store, listener, file } = running

    store.logger.info("Starting mail relay", {
      address: formatHostPort(listener.address()),
      configFile: file,
    })
  }

  /**
   * Loads and validates the configuration file and opens a new log sink, then publishes
   * both at once. On any failure the active snapshot stays as it was. Never rejects.
   */
  reload(): Promise<void> {
    this.reloading = this.reloading.then(() => this.reloadOnce())

    return this.reloading
  }

  /** Stops accepting, cancels in-flight work and waits for connections to settle. */
  stop(): Promise<StopResult> {
    this.stopping ??= this.stopOnce()

    return this.stopping
  }

  private async open(): Promise<Running> {
    const { config, file } = await this.collabs.loadConfig({
      ...this.loadOptions(),
      persistDefaults: true,
      logger: this.deps.logger,
    })

    const { logger, sink } = await this.collabs.openLogging(config.value.logging, {
      service: this.options.name,
    })

    const listener = this.collabs.createListener()

    try {
      await listener.listen(config.value.server.internalAddr)
    } catch (err) {
      await sink
        .close()
        .catch((closeErr: unknown) =>
          this.deps.logger.warn("Failed to close log sink", { err: closeErr }),
        )
      throw err
    }

    const store = new SnapshotStore(config.value, logger, sink)
    const controller = new AbortController()
    const tracker = new ConnectionTracker(store.logger)
    const handler = new ConnectionHandler({
      engine: this.engine,
      acquire: () => store.acquire(),
    })

    const acceptor = runAcceptor(
      {
        listener,
        logger: store.logger,
        dispatch: (socket) => tracker.track(handler.handle(socket, controller.signal)),
      },
      controller.signal,
    ).catch((err: unknown) => store.logger.error("Acceptor failed", { err }))

    return { file, store, listener, controller, tracker, acceptor }
  }

  private async reloadOnce(): Promise<void> {
    const running = this.running
    if (!running || this.state !== "running") return

    const { store } = running

    try {
      const { config } = await this.collabs.loadConfig({
        ...this.loadOptions(),
        file: running.file,
        requireFile: true,
        logger: store.logger,
      })

      const { logger, sink } = await this.collabs.openLogging(config.value.logging, {
        service: this.options.name,
      })

      if (this.state !== "running") {
        await sink.close()
        return
      }

      const previous = store.snapshot.config.server.internalAddr
      const snapshot = store.swap(config.value, logger, sink)

      store.logger.info("Configuration reloaded", { generation: snapshot.generation })

      if (snapshot.config.server.internalAddr !== previous) {
        store.logger.warn("Listen address changes take effect after a restart", {
          address: previous,
        })
      }
    } catch (err) {
      store.logger.error("Failed to reload configuration", { err })
    }
  }

  private async stopOnce(): Promise<StopResult> {
    const running = this.running

    if (!running) {
      this.state = "stopped"
      this.deps.logger.warn("Stop called but relay server not running")
      return { ok: true, failures: [], timedOut: false }
    }

    this.state = "stopping"

    const { store, listener, controller, tracker, acceptor } = running
    const logger = store.logger

    const result = await this.collabs.shutdown({
      clock: this.deps.clock,
      logger,
      drainTimeoutMs: store.snapshot.config.server.shutdownTimeoutMs,
      ...(this.options.flushTimeoutMs !== undefined && {
        flushTimeoutMs: this.options.flushTimeoutMs,
      }),
      stopHooks: [
        {
          name: "listener.close",
          fn: async () => {
            controller.abort(new Error("relay server stopping"))
            await listener.close()
            await acceptor
          },
        },
        {
          name: "connections.drain",
          fn: async ({ signal }) => {
            const drained = await tracker.drain(signal)

            if (!drained) {
              logger.warn("Connections still open at drain deadline", { open: tracker.size })
            }
          },
        },
      ],
      flush: () => store.flush(),
    })

    this.signalHandler?.unregister()
    this.state = "stopped"

    return result
  }

  private loadOptions(): LoadRelayConfigOptions {
    const { name, file, env, cwd, overrides } = this.options

    return {
      name,
      ...(file !== undefined && { file }),
      ...(env && { env }),
      ...(cwd !== undefined && { cwd }),
      ...(overrides && { overrides }),
    }
  }

  private requireRunning(): Running {
    if (!this.running) throw new Error("Relay server is not running")

    return this.running
  }
}

export function createRelayServer(deps: RelayServerDeps, options: RelayServerOptions): RelayServer {
  return new RelayServer(deps, options)
}
