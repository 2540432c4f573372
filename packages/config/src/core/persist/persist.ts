import { ConfigFileStore } from "../../adapters/fs/config-file-store"
import { TomlCodec } from "../../adapters/toml/toml-codec"
import type { AgentConfig, DeepReadonly } from "../../ports/agent-config"
import type { StructuredCodec } from "../../ports/codec"
import { encodeConfig } from "../codec/encode"
import { CONFIG_FILE_HEADER } from "../constants"
import { ConfigIoError } from "../errors"
import { agentConfigSchema } from "../schema/agent-config.schema"

/**
 * Render every setting of `config` as a commented document.
 */
export function dumpConfig(config: AgentConfig, codec: StructuredCodec = new TomlCodec()): string {
  return encodeConfig(agentConfigSchema, config, codec)
}

export type SaveConfigOptions = {
  codec?: StructuredCodec
  store?: ConfigFileStore
}

/**
 * Replace the file at `filePath` with the header and the full dump of `config`.
 */
export async function saveConfigFile(
  config: AgentConfig,
  filePath: string,
  options: SaveConfigOptions = {},
): Promise<void> {
  const store = options.store ?? new ConfigFileStore()

  let body: string
  try {
    body = dumpConfig(config, options.codec)
  } catch (err) {
    throw ConfigIoError.wrap("encode", filePath, err)
  }

  await store.ensureDirectory(filePath)
  await store.write(filePath, CONFIG_FILE_HEADER + body, "truncate")
}

/** Self-update check interval in milliseconds. */
export function updateCheckIntervalMs(config: DeepReadonly<Pick<AgentConfig, "selfUpdate">>): number {
  return config.selfUpdate.checkInterval * 1000
}
