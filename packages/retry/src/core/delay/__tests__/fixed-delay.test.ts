import { fixedDelay } from "../fixed-delay"

describe("fixedDelay", () => {
  it("returns the same delay for every attempt", () => {
    const policy = fixedDelay(10_000)

    expect(policy.getDelay(0)).toEqual({ milliseconds: 10_000 })
    expect(policy.getDelay(7)).toEqual({ milliseconds: 10_000 })
  })

  it.each([-1, Number.POSITIVE_INFINITY, Number.NaN])("rejects %s", (ms) => {
    expect(() => fixedDelay(ms)).toThrow(RangeError)
  })
})
