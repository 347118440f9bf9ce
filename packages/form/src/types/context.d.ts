import type { Logger } from "@mailrelay/logger"

export type FormContextVariables = {
  requestId: string
  logger: Logger
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends FormContextVariables {}
}
