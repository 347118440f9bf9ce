export { parseArgs, type SendmailArgs } from "./core/args"
export { buildRequest, DEFAULT_SUBJECT } from "./core/build-request"
export { ExitCode } from "./core/exit-code"
export { type ParsedMessage, type ParseMessageOptions, parseMessage } from "./core/message"
export { SendmailError, type SendmailErrorCode } from "./core/sendmail-error"
export {
  PROGRAM_NAME,
  type RelaySender,
  runSendmail,
  type SendmailCollaborators,
  type SendmailIo,
} from "./cli/run"
