import { BaseError } from "@mailrelay/errors"

export class ListenerClosedError extends BaseError<"listener_closed"> {
  constructor() {
    super("listener is closed", { code: "listener_closed" })
  }
}
