import type { Logger, LogContext, LogContextPatch, LogMeta, LogSink } from "@mailrelay/logger"
import type { RelayConfig } from "../config/relay-config"

/** Configuration and logger of one generation. Never mutated once published. */
export type RelaySnapshot = Readonly<{
  generation: number
  config: RelayConfig
  logger: Logger
}>

export type SnapshotLease = {
  readonly snapshot: RelaySnapshot
  /** Gives the snapshot back. Only the first call counts. */
  release: () => void
}

type Entry = {
  snapshot: RelaySnapshot
  sink: LogSink
  leases: number
  retired: boolean
}

/**
 * Holds the active snapshot. A reload publishes a whole new snapshot in one assignment;
 * connections that took the previous one keep it until they release it, and its log sink
 * is closed after the last release.
 */
export class SnapshotStore {
  private current: Entry
  private readonly retired = new Set<Entry>()
  private readonly closing = new Set<Promise<void>>()

  /** Always logs through the current generation. */
  readonly logger: Logger

  constructor(config: RelayConfig, logger: Logger, sink: LogSink) {
    this.current = this.entry(1, config, logger, sink)
    this.logger = new CurrentLogger(() => this.current.snapshot.logger)
  }

  get snapshot(): RelaySnapshot {
    return this.current.snapshot
  }

  acquire(): SnapshotLease {
    const entry = this.current
    let released = false

    entry.leases++

    return {
      snapshot: entry.snapshot,
      release: () => {
        if (released) return
        released = true
        entry.leases--

        if (entry.retired && entry.leases === 0) this.closeSink(entry)
      },
    }
  }

  /** Publishes a new generation and returns it. */
  swap(config: RelayConfig, logger: Logger, sink: LogSink): RelaySnapshot {
    const previous = this.current

    this.current = this.entry(previous.snapshot.generation + 1, config, logger, sink)

    previous.retired = true
    if (previous.leases === 0) this.closeSink(previous)
    else this.retired.add(previous)

    return this.current.snapshot
  }

  /** Flushes every open sink, and waits for retired sinks still closing. */
  async flush(): Promise<void> {
    const sinks = [this.current.sink, ...[...this.retired].map((entry) => entry.sink)]

    await Promise.all([...sinks.map((sink) => sink.flush()), ...this.closing])
  }

  private entry(generation: number, config: RelayConfig, logger: Logger, sink: LogSink): Entry {
    return {
      snapshot: Object.freeze({ generation, config, logger: logger.child({ generation }) }),
      sink,
      leases: 0,
      retired: false,
    }
  }

  private closeSink(entry: Entry): void {
    this.retired.delete(entry)

    const closing = entry.sink
      .close()
      .catch((err: unknown) => this.logger.warn("Failed to close log sink", { err }))
      .finally(() => this.closing.delete(closing))

    this.closing.add(closing)
  }
}

class CurrentLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  constructor(private readonly resolve: () => Logger<TContext>) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().trace(message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().debug(message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().info(message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().warn(message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().error(message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.resolve().fatal(message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new CurrentLogger<TContext & U>(() => this.resolve().child(context))
  }
}
