import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { testRelayConfig } from "../../tests/relay-config"
import { openLogging } from "../logging"

describe("openLogging (e2e)", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "mailrelay-logging-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes JSON lines at the configured level to <directory>/<name>.1.log", async () => {
    const { logging } = testRelayConfig({
      logging: { target: "file", directory: dir, name: "relay", level: "info", bufferSize: 1 },
    })

    const { logger, sink } = await openLogging(logging, { service: "mailrelayd" })
    logger.debug("dropped")
    logger.info("kept", { recipient: "a@b.com" })
    await sink.close()

    const lines = (await readFile(path.join(dir, "relay.1.log"), "utf8")).trim().split("\n")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: 30,
      msg: "kept",
      service: "mailrelayd",
      recipient: "a@b.com",
    })
  })

  it("creates a missing log directory", async () => {
    const { logging } = testRelayConfig({
      logging: { target: "file", directory: path.join(dir, "nested", "logs"), name: "relay" },
    })

    const { logger, sink } = await openLogging(logging)
    logger.warn("created")
    await sink.close()

    const text = await readFile(path.join(dir, "nested", "logs", "relay.1.log"), "utf8")
    expect(text).toContain('"msg":"created"')
  })

  it("rejects when the log directory cannot be created", async () => {
    await writeFile(path.join(dir, "blocker"), "")
    const { logging } = testRelayConfig({
      logging: { target: "file", directory: path.join(dir, "blocker", "sub"), name: "x" },
    })

    await expect(openLogging(logging)).rejects.toThrow()
  })
})
