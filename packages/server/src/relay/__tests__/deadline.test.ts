import { DeadlineExceededError, withDeadline } from "../deadline"

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("aborts with DeadlineExceededError once the time is up", async () => {
    vi.useFakeTimers()
    const parent = new AbortController()
    const { signal, dispose } = withDeadline(parent.signal, 1_000)

    await vi.advanceTimersByTimeAsync(999)
    expect(signal.aborted).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    expect(signal.aborted).toBe(true)
    expect(signal.reason).toBeInstanceOf(DeadlineExceededError)
    expect(signal.reason).toMatchObject({ timeoutMs: 1_000 })

    dispose()
  })

  it("aborts with the parent's reason when the parent aborts first", () => {
    const parent = new AbortController()
    const reason = new Error("stopping")
    const { signal, dispose } = withDeadline(parent.signal, 60_000)

    parent.abort(reason)

    expect(signal.aborted).toBe(true)
    expect(signal.reason).toBe(reason)
    dispose()
  })

  it("starts aborted when the parent already is", () => {
    const parent = new AbortController()
    parent.abort("gone")

    const { signal } = withDeadline(parent.signal, 60_000)

    expect(signal.aborted).toBe(true)
    expect(signal.reason).toBe("gone")
  })

  it("stops following the parent and the timer once disposed", async () => {
    vi.useFakeTimers()
    const parent = new AbortController()
    const { signal, dispose } = withDeadline(parent.signal, 1_000)

    dispose()
    parent.abort()
    await vi.advanceTimersByTimeAsync(5_000)

    expect(signal.aborted).toBe(false)
  })
})
