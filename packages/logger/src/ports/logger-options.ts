import type { LogLevelName } from "./log-level"

/**
 * Policy options every adapter must honor.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of JSON lines.
   * Ignored when an explicit destination stream is given.
   */
  prettify?: boolean

  /**
   * Standard stream written to when no destination stream is given.
   * A CLI that prints results on stdout logs to stderr.
   *
   * @default "stdout"
   */
  target?: "stdout" | "stderr"
}
