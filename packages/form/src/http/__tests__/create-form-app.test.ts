import { RecordingLogger } from "@mailrelay/server/testing"
import type { Hono } from "hono"
import type { Mock as FnMock } from "vitest"
import { createFormApp, type FormSender } from "../create-form-app"

const ALLOWED = "https://example.com"
const validBody = JSON.stringify({ name: "Ada", email: "ada@example.com", message: "Hello" })

describe("createFormApp", () => {
  let logger: RecordingLogger
  let send: FnMock<FormSender>
  let app: Hono

  beforeEach(() => {
    logger = new RecordingLogger()
    send = vi.fn<FormSender>().mockResolvedValue(undefined)
    app = createFormApp(
      { logger, send },
      {
        allowedOrigins: [ALLOWED, "http://localhost:3000"],
        recipient: "inbox@example.com",
        relayAddr: "127.0.0.1:2525",
        maxBodyBytes: 256,
      },
    )
  })

  function post(body: string, origin: string | null = ALLOWED, path = "/"): Promise<Response> {
    return Promise.resolve(
      app.request(path, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(origin !== null && { Origin: origin }),
        },
        body,
      }),
    )
  }

  it("forwards a valid submission and answers success", async () => {
    const res = await post(validBody)

    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toStrictEqual({ status: "success" })
    expect(send).toHaveBeenCalledExactlyOnceWith("127.0.0.1:2525", {
      recipient: "inbox@example.com",
      subject: "Contact Form Submission from Ada",
      body: "New contact form submission:\n\nName: Ada\nEmail: ada@example.com\n\nMessage:\nHello",
    })
    expect(logger.find("Form submission processed successfully")?.fields).toMatchObject({
      name: "Ada",
      email: "ada@example.com",
    })
  })

  it("accepts the POST on any path", async () => {
    const res = await post(validBody, ALLOWED, "/contact")

    expect(res.status).toBe(200)
  })

  it("sets the CORS headers and echoes an allowed origin", async () => {
    const res = await post(validBody)

    expect(res.headers.get("Access-Control-Allow-Origin")).toBe(ALLOWED)
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("POST, OPTIONS")
    expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Content-Type")
    expect(res.headers.get("Access-Control-Max-Age")).toBe("86400")
  })

  describe("preflight", () => {
    it("answers 200 for an allowed origin", async () => {
      const res = await app.request("/", { method: "OPTIONS", headers: { Origin: ALLOWED } })

      expect(res.status).toBe(200)
      expect(res.headers.get("Access-Control-Allow-Origin")).toBe(ALLOWED)
    })

    it("answers 403 for any other origin", async () => {
      const res = await app.request("/", {
        method: "OPTIONS",
        headers: { Origin: "https://evil.example" },
      })

      expect(res.status).toBe(403)
      expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull()
      expect(res.headers.get("Access-Control-Allow-Methods")).toBe("POST, OPTIONS")
    })
  })

  it.each([
    ["an unlisted origin", "https://evil.example"],
    ["a prefix of an allowed origin", "https://example.co"],
    ["no origin", null],
  ])("refuses %s", async (_label, origin) => {
    const res = await post(validBody, origin)

    expect(res.status).toBe(403)
    await expect(res.text()).resolves.toBe("Forbidden")
    expect(send).not.toHaveBeenCalled()
  })

  it("answers 405 to other methods", async () => {
    const res = await app.request("/", { method: "GET", headers: { Origin: ALLOWED } })

    expect(res.status).toBe(405)
    await expect(res.text()).resolves.toBe("Method not allowed")
    expect(logger.find("Invalid request method")?.fields).toMatchObject({ method: "GET" })
  })

  it("answers 400 to a body that is not JSON", async () => {
    const res = await post("name=Ada")

    expect(res.status).toBe(400)
    await expect(res.text()).resolves.toBe("Invalid request body")
  })

  it("answers 400 with the first failed rule", async () => {
    const res = await post(JSON.stringify({ name: "Ada", email: "nope", message: "" }))

    expect(res.status).toBe(400)
    await expect(res.text()).resolves.toBe("invalid email address")
    expect(send).not.toHaveBeenCalled()
  })

  it("answers 413 to an oversized body", async () => {
    const res = await post(JSON.stringify({ name: "Ada", email: "a@b", message: "x".repeat(300) }))

    expect(res.status).toBe(413)
    expect(send).not.toHaveBeenCalled()
  })

  it("answers 500 when the relay cannot be reached", async () => {
    send.mockRejectedValue(new Error("connect to 127.0.0.1:2525 failed"))

    const res = await post(validBody)

    expect(res.status).toBe(500)
    await expect(res.text()).resolves.toBe("Failed to process submission")
    expect(logger.find("Failed to forward submission to relay")?.level).toBe("error")
  })

  it("scopes request logs by request id", async () => {
    await post(validBody)

    const completed = logger.find("Request completed")
    expect(completed?.fields).toMatchObject({ method: "POST", path: "/", status: 200 })
    expect(completed?.fields.requestId).toEqual(expect.any(String))
  })
})
