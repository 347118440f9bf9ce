export {
  defaultConfigFile,
  ENV_DELIMITER,
  ENV_PREFIX,
  type LoadedRelayConfig,
  type LoadRelayConfigFn,
  type LoadRelayConfigOptions,
  loadRelayConfig,
  resolveConfigFile,
} from "./config/load-relay-config"
export {
  defaultRelayConfig,
  type LoggingConfig,
  MAX_TIMER_MS,
  type RelayConfig,
  relayConfigSchema,
  type RelayServerConfig,
  type SmtpConfig,
} from "./config/relay-config"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export { untilAborted } from "./lifecycle/run-hooks"
export {
  DEFAULT_FLUSH_TIMEOUT_MS,
  type ShutdownContext,
  type ShutdownFn,
  type StopResult,
  shutdown,
} from "./lifecycle/shutdown"
export {
  type SetupProcessHandlersFn,
  type SignalHandler,
  type SignalHandlerContext,
  setupProcessHandlers,
} from "./lifecycle/signals"
export { ListenerClosedError } from "./net/listener-closed-error"
export { createTcpListener, TcpListener } from "./net/tcp-listener"
export { type DeliveryOutcome, DeliveryEngine } from "./relay/delivery-engine"
export { type OpenedLogging, type OpenLoggingFn, openLogging } from "./runtime/logging"
export type { RelaySnapshot, SnapshotLease } from "./runtime/snapshot-store"
export {
  createRelayServer,
  RelayServer,
  type RelayServerDeps,
  type RelayServerOptions,
  type RelayServerState,
} from "./server/relay-server"
