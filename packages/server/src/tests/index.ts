export type { Mock } from "./mock"
export { type LogEntry, RecordingLogger } from "./recording-logger"
export { type RelayConfigPatch, testRelayConfig } from "./relay-config"
export { readUntilClosed, socketPair } from "./socket-pair"
