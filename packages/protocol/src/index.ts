export { RelayClient, type RelayClientOptions, type RelayRequest } from "./adapters/tcp/relay-client"
export { RelayClientError, type RelayClientStage } from "./adapters/tcp/relay-client-error"
export { formatHostPort, type HostPort, parseHostPort } from "./core/address"
export {
  type EmailRequest,
  type EmailRequestWire,
  type EncodeRequestOptions,
  emailRequestSchema,
  encodeEmailRequest,
  parseEmailRequest,
} from "./core/email-request"
export { ObjectScanner } from "./core/object-scanner"
export { type ReadRequestOptions, readRequest } from "./core/read-request"
export { type DecodeFailureReason, RequestDecodeError } from "./core/request-decode-error"
