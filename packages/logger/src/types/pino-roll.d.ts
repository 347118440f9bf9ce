declare module "pino-roll" {
  import type pino from "pino"

  type SonicBoom = ReturnType<typeof pino.destination>

  export type PinoRollOptions = {
    /** Base path; files are written as `<file>.<n><extension>`. */
    file: string | (() => string)
    /** Number (MB) or a string with a `k`, `m` or `g` unit. */
    size?: string | number
    frequency?: "daily" | "hourly" | number
    extension?: string
    limit?: { count?: number; removeOtherLogFiles?: boolean }
    symlink?: boolean
    dateFormat?: string
    mkdir?: boolean
    minLength?: number
    sync?: boolean
  }

  export default function pinoRoll(options: PinoRollOptions): Promise<SonicBoom>
}
