import type { MailMessage, MailTransport, SendResult } from "@mailrelay/email"
import type { Logger } from "@mailrelay/logger"
import type { EmailRequest } from "@mailrelay/protocol"
import { fixedDelay, type IRetryExecutor, type RetryObserver } from "@mailrelay/retry"
import type { RelayConfig } from "../config/relay-config"

export type DeliveryOutcome = "sent" | "abandoned" | "cancelled"

export type DeliveryEngineDeps = {
  transport: MailTransport
  retryExecutor: IRetryExecutor
}

export type DeliverOptions = {
  /** Stops the wait between attempts. An attempt already running is left to finish. */
  signal: AbortSignal
  logger: Logger
}

/**
 * Sends one request through the transport, up to `server.maxRetries` attempts spaced by
 * `server.retryDelayMs`. The outcome is only logged; nothing is reported to the sender.
 */
export class DeliveryEngine {
  constructor(private readonly deps: DeliveryEngineDeps) {}

  async deliver(
    request: EmailRequest,
    config: RelayConfig,
    options: DeliverOptions,
  ): Promise<DeliveryOutcome> {
    const logger = options.logger.child({ module: "delivery", recipient: request.recipient })
    const message = toMessage(request, config)

    const result = await this.deps.retryExecutor.tryExecute(
      () => this.deps.transport.send(message, config.smtp),
      {
        maxAttempts: config.server.maxRetries,
        delay: fixedDelay(config.server.retryDelayMs),
        observer: deliveryObserver(logger),
        signal: options.signal,
      },
    )

    if (result.success) return "sent"
    if (result.aborted) return "cancelled"

    logger.error("Email delivery abandoned", { attempts: result.attempts, err: result.error })

    return "abandoned"
  }
}

function toMessage(request: EmailRequest, config: RelayConfig): MailMessage {
  return {
    from: config.smtp.fromAddr,
    to: request.recipient,
    subject: request.subject,
    text: request.body,
  }
}

function deliveryObserver(logger: Logger): RetryObserver<SendResult> {
  return {
    onAttempt: async ({ attemptsSoFar }) => {
      logger.debug("Attempting to send email", { attempt: attemptsSoFar })
    },
    onError: async (err, { attemptsSoFar, nextDelayMs }) => {
      logger.warn("Email attempt failed", {
        attempt: attemptsSoFar,
        willRetry: true,
        retryInMs: nextDelayMs,
        err,
      })
    },
    onExhausted: async (err, { attemptsSoFar }) => {
      logger.error("Email attempt failed", { attempt: attemptsSoFar, willRetry: false, err })
    },
    onSuccess: async (result, { attemptsSoFar }) => {
      logger.info("Email sent successfully", {
        attempt: attemptsSoFar,
        messageId: result.messageId,
      })
    },
    onAborted: async ({ attempt }) => {
      logger.info("Email processing cancelled", { attemptsMade: attempt })
    },
  }
}
