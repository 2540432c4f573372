import type { ReadonlyAgentConfig } from "./agent-config"

/**
 * Where the final value of a key came from.
 *
 * `file:<path>` for keys read from the config file.
 */
export type ValueOrigin =
  | "default"
  | "env"
  | "bootstrap"
  | "migration"
  | "validation"
  | `file:${string}`

/**
 * The resolved, validated and frozen agent configuration.
 *
 * @example
 * ```typescript
 * const config = await setupConfig({ path: "/etc/hostmon/hostmon.conf" })
 *
 * config.value.interval             // 90
 * config.explain("interval")        // "file:/etc/hostmon/hostmon.conf"
 * config.explain("jobmon.severity") // "default"
 * ```
 */
export interface IResolvedConfig {
  /** Full validated config object */
  readonly value: ReadonlyAgentConfig

  /** Config file the value was resolved against */
  readonly path: string

  /** `true` when the file did not exist and a minimal one was written */
  readonly bootstrapped: boolean

  /**
   * Explains which stage set the final value of a key.
   *
   * @param key - Dotted TOML key, e.g. "interval" or "jobmon.spool_dir".
   */
  explain(key: string): ValueOrigin

  /**
   * Returns the distinct origins of all keys, in first-seen order.
   */
  sourcesUsed(): ValueOrigin[]

  /**
   * Returns keys present in the config file but not part of the schema.
   *
   * Useful for detecting typos and stale settings.
   */
  unknownKeys(): string[]

  /** Renders the full configuration as a commented document. */
  dump(): string
}
