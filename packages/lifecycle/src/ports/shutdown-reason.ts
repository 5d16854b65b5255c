export type ShutdownTrigger = "signal" | "shutdown" | "deadline"

export type ShutdownReason = {
  trigger: ShutdownTrigger
  /** Set when `trigger` is "signal". */
  signal?: NodeJS.Signals
  message: string
}
