import { parseArgs } from "../args"
import { buildRequest, DEFAULT_SUBJECT } from "../build-request"
import { parseMessage } from "../message"

describe("buildRequest", () => {
  it("uses the first recipient argument and the message body", () => {
    const request = buildRequest(parseArgs(["a@b.com"]), parseMessage("\nhello"))

    expect(request).toStrictEqual({
      recipient: "a@b.com",
      subject: DEFAULT_SUBJECT,
      body: Buffer.from("hello"),
    })
  })

  it("takes the recipient from the To header with -t", () => {
    const request = buildRequest(parseArgs(["-t", "ignored@b.com"]), parseMessage("To: c@d.com\n\nx"))

    expect(request.recipient).toBe("c@d.com")
  })

  it("prefers -s over the Subject header", () => {
    const message = parseMessage("Subject: from header\n\nx")

    expect(buildRequest(parseArgs(["-s", "from flag", "a@b.com"]), message).subject).toBe("from flag")
    expect(buildRequest(parseArgs(["a@b.com"]), message).subject).toBe("from header")
  })

  it("fails with exit 67 when -t finds no To header", () => {
    expect(() => buildRequest(parseArgs(["-t"]), parseMessage("\nx"))).toThrow(
      expect.objectContaining({ code: "no_recipient", exitCode: 67 }),
    )
  })

  it("fails with exit 64 without a recipient argument", () => {
    expect(() => buildRequest(parseArgs([]), parseMessage("\nx"))).toThrow(
      expect.objectContaining({ code: "usage", exitCode: 64, message: "No recipient specified" }),
    )
  })
})
