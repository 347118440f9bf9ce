export type HostPort = {
  /** Absent for ":port", meaning every interface when listening and localhost when dialing. */
  host?: string
  port: number
}

/**
 * Split a `host:port` address. IPv6 hosts must be bracketed (`[::1]:2525`).
 * Port 0 asks the system for a free port when listening.
 *
 * @throws RangeError when the address has no valid port.
 */
export function parseHostPort(address: string): HostPort {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/.exec(address.trim())
  const port = Number(match?.[3])

  if (!match || !Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new RangeError(`invalid address "${address}", expected host:port`)
  }

  const host = match[1] ?? match[2]

  return { ...(host && { host }), port }
}

export function formatHostPort({ host, port }: HostPort): string {
  if (!host) return `:${port}`

  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`
}
