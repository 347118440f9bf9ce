import { BaseError } from "@mailrelay/errors"

export type DecodeFailureReason =
  | "empty"
  | "truncated"
  | "too_large"
  | "timeout"
  | "aborted"
  | "invalid_json"
  | "invalid_request"
  | "io"

export class RequestDecodeError extends BaseError<"request_decode_failed"> {
  readonly reason: DecodeFailureReason

  constructor(reason: DecodeFailureReason, message: string, cause?: unknown) {
    super(message, {
      code: "request_decode_failed",
      context: { reason },
      ...(cause !== undefined && { cause }),
    })
    this.reason = reason
  }
}
