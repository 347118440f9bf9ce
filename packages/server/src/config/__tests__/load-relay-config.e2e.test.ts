import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { Logger } from "@mailrelay/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { loadRelayConfig, resolveConfigFile } from "../load-relay-config"
import { defaultRelayConfig, MAX_TIMER_MS } from "../relay-config"

describe("loadRelayConfig", () => {
  let dir: string
  let file: string
  let logger: Mock<Logger>

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-config-"))
    file = path.join(dir, "etc", "mailrelayd.json")
    logger = mock<Logger>()
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("uses the defaults when the file is missing", async () => {
    const { config, created } = await loadRelayConfig({ name: "mailrelayd", file, env: {}, cwd: dir })

    expect(config.value).toEqual(defaultRelayConfig("mailrelayd"))
    expect(created).toBe(false)
    await expect(fs.access(file)).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("persists the defaults when asked", async () => {
    const { created } = await loadRelayConfig({
      name: "mailrelayd",
      file,
      env: {},
      cwd: dir,
      persistDefaults: true,
      logger,
    })

    expect(created).toBe(true)
    expect(JSON.parse(await fs.readFile(file, "utf8"))).toEqual(defaultRelayConfig("mailrelayd"))
    expect(logger.info).toHaveBeenCalledWith("Default configuration written", { file })
  })

  it("logs and continues when the defaults cannot be written", async () => {
    const blocker = path.join(dir, "not-a-dir")
    await fs.writeFile(blocker, "")

    const { created, config } = await loadRelayConfig({
      name: "mailrelayd",
      file: path.join(blocker, "mailrelayd.json"),
      env: {},
      cwd: dir,
      persistDefaults: true,
      logger,
    })

    expect(created).toBe(false)
    expect(config.value.server.maxRetries).toBe(3)
    expect(logger.warn).toHaveBeenCalledWith(
      "Failed to write default configuration",
      expect.objectContaining({ err: expect.any(Error) }),
    )
  })

  it("layers file, environment and overrides over the defaults", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(
      file,
      JSON.stringify({ smtp: { host: "smtp.example.com" }, server: { maxRetries: 5 } }),
    )

    const { config } = await loadRelayConfig({
      name: "mailrelayd",
      file,
      cwd: dir,
      env: {
        MAILRELAY_SERVER__MAX_RETRIES: "7",
        MAILRELAY_SERVER__ALLOWED_ORIGINS: "https://a.example, https://b.example",
        MAILRELAY_LOGGING__PRETTIFY: "true",
      },
      overrides: { server: { internalAddr: "127.0.0.1:0" } },
    })

    expect(config.value.smtp.host).toBe("smtp.example.com")
    expect(config.value.smtp.port).toBe(587)
    expect(config.value.server.maxRetries).toBe(7)
    expect(config.value.server.allowedOrigins).toEqual(["https://a.example", "https://b.example"])
    expect(config.value.server.internalAddr).toBe("127.0.0.1:0")
    expect(config.value.logging.prettify).toBe(true)
    expect(config.explain("smtp.host")).toBe(`json:${file}`)
    expect(config.explain("server.maxRetries")).toBe("env")
    expect(config.explain("server.internalAddr")).toBe("overrides")
  })

  it("warns about keys the schema does not know", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, JSON.stringify({ smtp: { hots: "mail.example.com" } }))

    await loadRelayConfig({
      name: "mailrelayd",
      file,
      env: { MAILRELAY_CONFIG_FILE: file, MAILRELAY_SERVER__RETRY: "5" },
      cwd: dir,
      logger,
    })

    expect(logger.warn).toHaveBeenCalledExactlyOnceWith("Unknown configuration keys ignored", {
      file,
      keys: ["smtp.hots", "server.retry"],
    })
    expect(logger.debug).toHaveBeenCalledWith("Configuration loaded", {
      file,
      sources: ["defaults", `json:${file}`, "env"],
    })
  })

  it("reads .env from the working directory", async () => {
    await fs.writeFile(path.join(dir, ".env"), "MAILRELAY_SMTP__AUTH_PASS=test-secret\n")

    const { config } = await loadRelayConfig({ name: "mailrelayd", file, env: {}, cwd: dir })

    expect(config.value.smtp.authPass).toBe("test-secret")
  })

  it("requires the file on reload", async () => {
    await expect(
      loadRelayConfig({ name: "mailrelayd", file, env: {}, cwd: dir, requireFile: true }),
    ).rejects.toMatchObject({
      code: "config_not_found",
      message: "configuration file not found",
      context: { file },
    })
  })

  it("accepts durations up to the timer limit", async () => {
    const overrides = { server: { timeoutMs: MAX_TIMER_MS, retryDelayMs: MAX_TIMER_MS } }

    const { config } = await loadRelayConfig({ name: "mailrelayd", file, env: {}, cwd: dir, overrides })

    expect(config.value.server.timeoutMs).toBe(2_147_483_647)
    expect(config.value.server.retryDelayMs).toBe(2_147_483_647)
  })

  it.each([
    ["a non-positive retry count", { server: { maxRetries: 0 } }, "server.maxRetries"],
    ["an empty SMTP host", { smtp: { host: "" } }, "smtp.host"],
    ["a malformed listen address", { server: { internalAddr: "localhost" } }, "server.internalAddr"],
    ["an unknown log level", { logging: { level: "loud" } }, "logging.level"],
    ["an oversized log buffer", { logging: { bufferSize: 16_384 } }, "logging.bufferSize"],
    [
      "a request timeout past the timer range",
      { server: { timeoutMs: 2 ** 31 } },
      "server.timeoutMs",
    ],
    [
      "a retry delay past the timer range",
      { server: { retryDelayMs: 2 ** 31 } },
      "server.retryDelayMs",
    ],
    [
      "a drain timeout past the timer range",
      { server: { shutdownTimeoutMs: 2 ** 31 } },
      "server.shutdownTimeoutMs",
    ],
    [
      "an SMTP timeout past the timer range",
      { smtp: { timeoutMs: 2 ** 31 } },
      "smtp.timeoutMs",
    ],
    ["a single log file", { logging: { maxFiles: 1 } }, "logging.maxFiles"],
  ])("rejects %s", async (_label, overrides, field) => {
    const load = loadRelayConfig({ name: "mailrelayd", file, env: {}, cwd: dir, overrides })

    await expect(load).rejects.toMatchObject({ code: "config_invalid" })
    await expect(load).rejects.toThrow(field)
  })
})

describe("resolveConfigFile", () => {
  it("prefers MAILRELAY_CONFIG_FILE", () => {
    expect(resolveConfigFile("mailrelayd", { MAILRELAY_CONFIG_FILE: "/tmp/relay.json" })).toBe(
      "/tmp/relay.json",
    )
  })

  it("falls back to the per-program path", () => {
    expect(resolveConfigFile("mailrelay-form", {})).toBe(
      "/usr/local/etc/mailrelay-form/mailrelay-form.json",
    )
  })
})
