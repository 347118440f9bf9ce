import type { Readable, Writable } from "node:stream"
import { buffer } from "node:stream/consumers"
import { describeError } from "@mailrelay/errors"
import { RelayClient, type RelayRequest } from "@mailrelay/protocol"
import { type LoadRelayConfigFn, loadRelayConfig } from "@mailrelay/server"
import { parseArgs } from "../core/args"
import { buildRequest } from "../core/build-request"
import { ExitCode } from "../core/exit-code"
import { parseMessage } from "../core/message"
import { SendmailError } from "../core/sendmail-error"

export const PROGRAM_NAME = "mailrelay-sendmail"

export type SendmailIo = {
  argv: readonly string[]
  stdin: Readable
  stdout: Writable
  stderr: Writable
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** @default process.cwd() */
  cwd?: string
}

export type RelaySender = (address: string, request: RelayRequest) => Promise<void>

export interface SendmailCollaborators {
  loadConfig: LoadRelayConfigFn
  send: RelaySender
}

const sendViaRelay: RelaySender = (address, request) =>
  new RelayClient({ address, connectTimeoutMs: 30_000, writeTimeoutMs: 5_000 }).send(request)

const defaultCollaborators: SendmailCollaborators = {
  loadConfig: loadRelayConfig,
  send: sendViaRelay,
}

/** Runs the command and returns its exit status. Diagnostics go to `stderr`. */
export async function runSendmail(
  io: SendmailIo,
  collabs: SendmailCollaborators = defaultCollaborators,
): Promise<ExitCode> {
  try {
    await sendmail(io, collabs)
    return ExitCode.OK
  } catch (err) {
    if (!(err instanceof SendmailError)) throw err

    io.stderr.write(`${PROGRAM_NAME}: ${describeError(err)}\n`)
    return err.exitCode
  }
}

async function sendmail(io: SendmailIo, collabs: SendmailCollaborators): Promise<void> {
  const args = parseArgs(io.argv)
  const address = await relayAddress(io, collabs.loadConfig)

  if (args.queueCommand) {
    io.stdout.write("Mail queue is empty\n")
    return
  }

  let input: Buffer
  try {
    input = await buffer(io.stdin)
  } catch (err) {
    throw new SendmailError("input_unreadable", "Error reading message", err)
  }

  const request = buildRequest(args, parseMessage(input, { ignoreDots: args.ignoreDots }))

  try {
    await collabs.send(address, request)
  } catch (err) {
    throw new SendmailError("relay_failed", "Error sending email", err)
  }
}

async function relayAddress(io: SendmailIo, loadConfig: LoadRelayConfigFn): Promise<string> {
  try {
    const { config } = await loadConfig({
      name: PROGRAM_NAME,
      ...(io.env && { env: io.env }),
      ...(io.cwd !== undefined && { cwd: io.cwd }),
    })

    return config.value.server.internalAddr
  } catch (err) {
    throw new SendmailError("config_unavailable", "Failed to load configuration", err)
  }
}
