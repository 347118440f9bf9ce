import type { Clock } from "@mailrelay/clock"
import type { Logger, LogSink } from "@mailrelay/logger"
import { formatHostPort, type HostPort, RelayClient } from "@mailrelay/protocol"
import {
  type LoadRelayConfigFn,
  loadRelayConfig,
  type OpenLoggingFn,
  openLogging,
  type SetupProcessHandlersFn,
  type ShutdownFn,
  type SignalHandler,
  type StopResult,
  setupProcessHandlers,
  shutdown,
  untilAborted,
} from "@mailrelay/server"
import { type CreateFormAppFn, createFormApp, type FormSender } from "../http/create-form-app"
import { type BoundServer, closeServer, type ListenFn, listen } from "./listen"

/** Budget for in-flight requests to finish once the server stops listening. */
export const FORM_DRAIN_TIMEOUT_MS = 5_000

export type FormServerState = "idle" | "starting" | "running" | "stopping" | "stopped"

export interface FormServerDeps {
  clock: Clock
  /** Logs until the configured logger is open. */
  logger: Logger
  /** @default a RelayClient with a 10 s write deadline */
  send?: FormSender
}

export interface FormServerOptions {
  /** Program name; selects the default config file and log name. */
  name: string
  file?: string
  env?: Record<string, string | undefined>
  cwd?: string
  overrides?: Record<string, unknown>
  /** @default 5_000 */
  flushTimeoutMs?: number
}

export interface FormServerCollaborators {
  loadConfig: LoadRelayConfigFn
  openLogging: OpenLoggingFn
  createApp: CreateFormAppFn
  listen: ListenFn
  shutdown: ShutdownFn
  setupProcessHandlers: SetupProcessHandlersFn
}

const defaultCollaborators: FormServerCollaborators = {
  loadConfig: loadRelayConfig,
  openLogging,
  createApp: createFormApp,
  listen,
  shutdown,
  setupProcessHandlers,
}

const sendViaRelay: FormSender = (address, request) =>
  new RelayClient({ address, writeTimeoutMs: 10_000 }).send(request)

type Running = BoundServer & {
  logger: Logger
  sink: LogSink
}

/** Contact form service: serves the form endpoint on `server.externalAddr`. */
export class FormServer {
  private state: FormServerState = "idle"
  private running?: Running
  private signalHandler?: SignalHandler
  private stopping?: Promise<StopResult>

  constructor(
    private readonly deps: FormServerDeps,
    private readonly options: FormServerOptions,
    private readonly collabs: FormServerCollaborators = defaultCollaborators,
  ) {}

  get logger(): Logger {
    return this.running?.logger ?? this.deps.logger
  }

  getState(): FormServerState {
    return this.state
  }

  address(): HostPort {
    if (!this.running) throw new Error("Form server is not running")

    return this.running.address
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.logger,
      stop: () => this.stop(),
    })

    return this
  }

  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error("Form server already started")
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

    running.logger.info("Starting contact form service", {
      address: formatHostPort(running.address),
    })
  }

  stop(): Promise<StopResult> {
    this.stopping ??= this.stopOnce()

    return this.stopping
  }

  private async open(): Promise<Running> {
    const { name, file, env, cwd, overrides } = this.options
    const { config } = await this.collabs.loadConfig({
      name,
      ...(file !== undefined && { file }),
      ...(env && { env }),
      ...(cwd !== undefined && { cwd }),
      ...(overrides && { overrides }),
      persistDefaults: true,
      logger: this.deps.logger,
    })

    const { smtp, server, logging } = config.value
    const { logger, sink } = await this.collabs.openLogging(logging, { service: name })

    const app = this.collabs.createApp(
      { logger: logger.child({ module: "form" }), send: this.deps.send ?? sendViaRelay },
      {
        allowedOrigins: server.allowedOrigins,
        recipient: smtp.fromAddr,
        relayAddr: server.internalAddr,
        maxBodyBytes: server.maxRequestBytes,
      },
    )

    try {
      const bound = await this.collabs.listen(app, server.externalAddr, {
        timeoutMs: server.timeoutMs,
      })

      return { ...bound, logger, sink }
    } catch (err) {
      await sink
        .close()
        .catch((closeErr: unknown) =>
          this.deps.logger.warn("Failed to close log sink", { err: closeErr }),
        )
      throw err
    }
  }

  private async stopOnce(): Promise<StopResult> {
    const running = this.running

    if (!running) {
      this.state = "stopped"
      this.deps.logger.warn("Stop called but form server not running")
      return { ok: true, failures: [], timedOut: false }
    }

    this.state = "stopping"

    const result = await this.collabs.shutdown({
      clock: this.deps.clock,
      logger: running.logger,
      drainTimeoutMs: FORM_DRAIN_TIMEOUT_MS,
      ...(this.options.flushTimeoutMs !== undefined && {
        flushTimeoutMs: this.options.flushTimeoutMs,
      }),
      stopHooks: [
        {
          name: "http.close",
          fn: async ({ signal }) => {
            const closed = await untilAborted(closeServer(running.server), signal)

            if (!closed) running.logger.warn("Requests still open at drain deadline")
          },
        },
      ],
      flush: () => running.sink.flush(),
    })

    this.signalHandler?.unregister()
    this.state = "stopped"

    return result
  }
}

export function createFormServer(deps: FormServerDeps, options: FormServerOptions): FormServer {
  return new FormServer(deps, options)
}
