import type { MinValuableConfig } from "../../ports/agent-config"
import type { EnvironmentSource } from "../../ports/environment-source"

export const ENV_HUB_URL = "HOSTMON_HUB_URL"
export const ENV_HUB_USER = "HOSTMON_HUB_USER"
export const ENV_HUB_PASSWORD = "HOSTMON_HUB_PASSWORD"

export type EnvRecord = Readonly<Record<string, string | undefined>>

type HubField = "hubUrl" | "hubUser" | "hubPassword"

const overrides: ReadonlyArray<{ variable: string; field: HubField; key: string }> = [
  { variable: ENV_HUB_URL, field: "hubUrl", key: "hub_url" },
  { variable: ENV_HUB_USER, field: "hubUser", key: "hub_user" },
  { variable: ENV_HUB_PASSWORD, field: "hubPassword", key: "hub_password" },
]

export type ApplyEnvOptions = {
  /**
   * - `true`: every set variable replaces the current value.
   * - `false`: only empty fields are filled.
   */
  force: boolean
}

/**
 * Copy hub connection settings from the environment.
 *
 * A variable set to an empty string counts as set.
 *
 * @returns TOML keys that were written.
 */
export function applyEnvOverrides(config: MinValuableConfig, env: EnvRecord, options: ApplyEnvOptions): string[] {
  const applied: string[] = []

  for (const { variable, field, key } of overrides) {
    const value = env[variable]
    if (value === undefined) continue
    if (!options.force && config[field] !== "") continue

    config[field] = value
    applied.push(key)
  }

  return applied
}

/**
 * Load variables from every source in order. Later sources win.
 */
export async function loadEnvironment(sources: readonly EnvironmentSource[]): Promise<Record<string, string>> {
  const merged: Record<string, string> = {}

  for (const source of sources) {
    Object.assign(merged, await source.load())
  }

  return merged
}
