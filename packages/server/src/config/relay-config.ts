import { logLevelNames } from "@mailrelay/logger"
import { parseHostPort } from "@mailrelay/protocol"
import { z } from "zod"

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647

const positiveInt = z.coerce.number().int().positive()

const durationMs = positiveInt.max(MAX_TIMER_MS)

const address = z
  .string()
  .min(1)
  .refine(isHostPort, { error: "must be host:port" })

const booleanish = z.union([z.boolean(), z.stringbool()])

const origins = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((origin) => origin.trim())
          .filter(Boolean)
      : value,
  z.array(z.string().min(1)),
)

export const relayConfigSchema = z.object({
  smtp: z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65_535),
    fromAddr: z.string().min(1),
    authUser: z.string().min(1),
    authPass: z.string().min(1),
    timeoutMs: durationMs,
  }),
  server: z.object({
    internalAddr: address,
    externalAddr: address,
    timeoutMs: durationMs,
    retryDelayMs: durationMs,
    maxRetries: positiveInt,
    maxRequestBytes: positiveInt,
    shutdownTimeoutMs: durationMs,
    allowedOrigins: origins,
  }),
  logging: z.object({
    level: z.enum(logLevelNames),
    target: z.enum(["file", "stdout", "stderr"]),
    directory: z.string().min(1),
    name: z.string().min(1),
    // pino's file destination rejects a buffer of 16 KiB or more
    bufferSize: positiveInt.max(16_383),
    /** Size at which the file rolls over to the next numbered file. */
    maxSizeMb: positiveInt,
    /** Files kept on disk, the one being written included. */
    maxFiles: positiveInt.min(2),
    prettify: booleanish,
  }),
})

export type RelayConfig = z.infer<typeof relayConfigSchema>
export type SmtpConfig = RelayConfig["smtp"]
export type RelayServerConfig = RelayConfig["server"]
export type LoggingConfig = RelayConfig["logging"]

export function defaultRelayConfig(name: string): RelayConfig {
  return {
    smtp: {
      host: "smtp.gmail.com",
      port: 587,
      fromAddr: "user@example.com",
      authUser: "user@example.com",
      authPass: "change-me",
      timeoutMs: 60_000,
    },
    server: {
      internalAddr: "localhost:2525",
      externalAddr: "localhost:8845",
      timeoutMs: 180_000,
      retryDelayMs: 10_000,
      maxRetries: 3,
      maxRequestBytes: 10 * 1024 * 1024,
      shutdownTimeoutMs: 10_000,
      allowedOrigins: ["https://example.com", "http://example.com"],
    },
    logging: {
      level: "debug",
      target: "file",
      directory: `/var/log/${name}`,
      name,
      bufferSize: 1000,
      maxSizeMb: 100,
      maxFiles: 10,
      prettify: false,
    },
  }
}

function isHostPort(value: string): boolean {
  try {
    parseHostPort(value)
    return true
  } catch {
    return false
  }
}
