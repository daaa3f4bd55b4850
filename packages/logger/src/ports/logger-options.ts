import type { LogLevelName } from "./log-level"

/**
 * Output policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON.
   * Meant for local runs; keep it off wherever logs are ingested.
   */
  prettify?: boolean
}
