import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit.
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Ignored when a destination stream
   * is injected.
   */
  prettify?: boolean
}
