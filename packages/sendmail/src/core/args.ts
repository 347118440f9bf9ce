import { SendmailError } from "./sendmail-error"

export type SendmailArgs = {
  /** `-f`; accepted for compatibility, the relay always sends from its own address. */
  from?: string
  /** `-t`: take the recipient from the `To` header. */
  recipientFromHeaders: boolean
  /** `-i`: a line holding a single dot does not end the input. */
  ignoreDots: boolean
  /** `-s` */
  subject?: string
  /** One of `-bp`, `-bi`, `-bh`, `-bpurg`. There is no queue to report on. */
  queueCommand: boolean
  /** Positional arguments, recipients first. */
  recipients: string[]
}

const valueFlags = new Set(["-f", "-s"])
const switchFlags = new Set(["-t", "-i"])
const queueFlags = new Set(["-bp", "-bi", "-bh", "-bpurg"])

/**
 * Parses sendmail-style arguments. Flags come before recipients; `--` ends them. A value
 * flag takes the next argument or a `-f=value` form.
 *
 * @throws SendmailError `usage` for an unknown flag or a missing value.
 */
export function parseArgs(argv: readonly string[]): SendmailArgs {
  const args: SendmailArgs = {
    recipientFromHeaders: false,
    ignoreDots: false,
    queueCommand: false,
    recipients: [],
  }

  let i = 0

  for (; i < argv.length; i++) {
    const arg = argv[i] ?? ""

    if (arg === "--") {
      i++
      break
    }
    if (!arg.startsWith("-") || arg === "-") break

    const [flag = arg, inline] = splitInline(arg)

    if (switchFlags.has(flag) && inline === undefined) {
      if (flag === "-t") args.recipientFromHeaders = true
      else args.ignoreDots = true
      continue
    }

    if (queueFlags.has(flag) && inline === undefined) {
      args.queueCommand = true
      continue
    }

    if (valueFlags.has(flag)) {
      const value = inline ?? argv[++i]

      if (value === undefined) {
        throw new SendmailError("usage", `flag needs an argument: ${flag}`)
      }

      if (flag === "-f") args.from = value
      else args.subject = value
      continue
    }

    throw new SendmailError("usage", `flag provided but not defined: ${flag}`)
  }

  args.recipients = argv.slice(i)

  return args
}

function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=")

  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)]
}
