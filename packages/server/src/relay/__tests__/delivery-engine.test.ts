import { FakeClock } from "@mailrelay/clock"
import type { MailTransport, SendResult } from "@mailrelay/email"
import type { EmailRequest } from "@mailrelay/protocol"
import { RetryExecutor } from "@mailrelay/retry"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { RecordingLogger } from "../../tests/recording-logger"
import { testRelayConfig } from "../../tests/relay-config"
import { DeliveryEngine } from "../delivery-engine"

const request: EmailRequest = {
  recipient: "a@b.com",
  subject: "hi",
  body: Buffer.from("hello"),
}

const sent: SendResult = { provider: "smtp", messageId: "<1@test>" }

/** Aborts the delivery the moment the engine starts waiting between attempts. */
class AbortOnSleepClock extends FakeClock {
  constructor(private readonly controller: AbortController) {
    super(0)
  }

  override async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.controller.abort()
    return super.sleep(ms, signal)
  }
}

describe("DeliveryEngine", () => {
  const config = testRelayConfig({ server: { maxRetries: 3, retryDelayMs: 1_000 } })

  let transport: Mock<MailTransport>
  let logger: RecordingLogger
  let controller: AbortController

  beforeEach(() => {
    transport = mock<MailTransport>()
    logger = new RecordingLogger()
    controller = new AbortController()
  })

  function engineWith(clock: FakeClock): DeliveryEngine {
    return new DeliveryEngine({ transport, retryExecutor: new RetryExecutor({ clock }) })
  }

  it("sends once and stops on the first success", async () => {
    const clock = new FakeClock(0)
    transport.send.mockResolvedValue(sent)

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("sent")
    expect(transport.send).toHaveBeenCalledExactlyOnceWith(
      { from: "user@example.com", to: "a@b.com", subject: "hi", text: Buffer.from("hello") },
      config.smtp,
    )
    expect(clock.sleeps).toStrictEqual([])
    expect(logger.find("Email sent successfully")?.fields).toMatchObject({
      module: "delivery",
      recipient: "a@b.com",
      attempt: 1,
      messageId: "<1@test>",
    })
  })

  it("retries after failures and waits the delay before each retry", async () => {
    const clock = new FakeClock(0)
    transport.send
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockResolvedValueOnce(sent)

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("sent")
    expect(transport.send).toHaveBeenCalledTimes(3)
    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([1_000, 1_000])
    expect(clock.nowMs()).toBe(2_000)
    expect(
      logger.findAll("Email attempt failed").map((e) => [e.fields.attempt, e.fields.willRetry]),
    ).toStrictEqual([
      [1, true],
      [2, true],
    ])
  })

  it("gives up after maxRetries attempts", async () => {
    const clock = new FakeClock(0)
    const error = new Error("535 authentication failed")
    transport.send.mockRejectedValue(error)

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("abandoned")
    expect(transport.send).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toHaveLength(2)
    expect(logger.findAll("Email attempt failed").at(-1)).toMatchObject({
      level: "error",
      fields: { attempt: 3, willRetry: false, err: error },
    })
    expect(logger.find("Email delivery abandoned")?.fields).toMatchObject({
      attempts: 3,
      err: error,
    })
  })

  it("does not wait after the only attempt when maxRetries is 1", async () => {
    const clock = new FakeClock(0)
    transport.send.mockRejectedValue(new Error("down"))

    const outcome = await engineWith(clock).deliver(
      request,
      testRelayConfig({ server: { maxRetries: 1 } }),
      { signal: controller.signal, logger },
    )

    expect(outcome).toBe("abandoned")
    expect(transport.send).toHaveBeenCalledOnce()
    expect(clock.sleeps).toStrictEqual([])
  })

  it("stops waiting and makes no further attempt when cancelled between attempts", async () => {
    const clock = new AbortOnSleepClock(controller)
    transport.send.mockRejectedValue(new Error("down"))

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("cancelled")
    expect(transport.send).toHaveBeenCalledOnce()
    expect(clock.sleeps).toStrictEqual([{ ms: 1_000, startedAt: 0, aborted: true }])
    expect(clock.nowMs()).toBe(0)
    expect(logger.messages("info")).toContain("Email processing cancelled")
    expect(logger.find("Email delivery abandoned")).toBeUndefined()
  })

  it("makes no attempt when already cancelled", async () => {
    const clock = new FakeClock(0)
    controller.abort()

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("cancelled")
    expect(transport.send).not.toHaveBeenCalled()
  })

  it("lets an attempt already in flight finish when cancelled during it", async () => {
    const clock = new FakeClock(0)
    transport.send.mockImplementation(async () => {
      controller.abort()
      return sent
    })

    const outcome = await engineWith(clock).deliver(request, config, {
      signal: controller.signal,
      logger,
    })

    expect(outcome).toBe("sent")
    expect(transport.send).toHaveBeenCalledOnce()
  })
})
