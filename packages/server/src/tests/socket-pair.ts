import net from "node:net"

export type SocketPair = {
  /** The sending side, as a caller of the relay sees it. */
  client: net.Socket
  /** The accepted side handed to the code under test. */
  server: net.Socket
  dispose: () => void
}

/** A connected loopback pair. */
export async function socketPair(): Promise<SocketPair> {
  const listener = net.createServer()
  await new Promise<void>((resolve) => listener.listen(0, "127.0.0.1", resolve))

  const address = listener.address()
  if (address === null || typeof address === "string") throw new Error("no TCP address")

  const accepted = new Promise<net.Socket>((resolve) => listener.once("connection", resolve))
  const client = net.createConnection({ host: "127.0.0.1", port: address.port })
  client.on("error", () => {})

  const server = await accepted
  listener.close()

  return {
    client,
    server,
    dispose: () => {
      client.destroy()
      server.destroy()
    },
  }
}

/** Everything the client receives until the server side closes. */
export function readUntilClosed(socket: net.Socket): Promise<Buffer> {
  const chunks: Buffer[] = []

  return new Promise((resolve) => {
    socket.on("data", (chunk: Buffer) => chunks.push(chunk))
    socket.once("close", () => resolve(Buffer.concat(chunks)))
  })
}
