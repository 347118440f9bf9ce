import { BaseError } from "@mailrelay/errors"

export type RelayClientStage = "connect" | "write"

export class RelayClientError extends BaseError<"relay_unavailable"> {
  constructor(
    message: string,
    context: { address: string; stage: RelayClientStage },
    cause?: unknown,
  ) {
    super(message, {
      code: "relay_unavailable",
      context,
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }
}
