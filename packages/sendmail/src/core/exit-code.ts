/** sysexits(3) codes the command returns. */
export const ExitCode = {
  OK: 0,
  USAGE: 64,
  NO_USER: 67,
  UNAVAILABLE: 69,
  TEMP_FAIL: 75,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]
