import { formatHostPort, parseHostPort } from "../address"

describe("parseHostPort", () => {
  it.each([
    ["localhost:2525", { host: "localhost", port: 2525 }],
    ["127.0.0.1:8845", { host: "127.0.0.1", port: 8845 }],
    ["[::1]:2525", { host: "::1", port: 2525 }],
    [":2525", { port: 2525 }],
    ["127.0.0.1:0", { host: "127.0.0.1", port: 0 }],
  ])("parses %s", (address, expected) => {
    expect(parseHostPort(address)).toEqual(expected)
  })

  it.each(["localhost", "localhost:-1", "localhost:70000", "::1:25", "host:port", ""])(
    "rejects %j",
    (address) => {
      expect(() => parseHostPort(address)).toThrow(RangeError)
    },
  )
})

describe("formatHostPort", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatHostPort({ host: "::1", port: 25 })).toBe("[::1]:25")
    expect(formatHostPort({ host: "localhost", port: 25 })).toBe("localhost:25")
    expect(formatHostPort({ port: 25 })).toBe(":25")
  })
})
