import { createNullLogger, type Logger } from "@hostmon/logger"

import { ConfigFileStore } from "../../adapters/fs/config-file-store"
import { TomlCodec } from "../../adapters/toml/toml-codec"
import type { MinValuableConfig } from "../../ports/agent-config"
import type { StructuredCodec } from "../../ports/codec"
import { encodeConfig } from "../codec/encode"
import { CONFIG_FILE_HEADER } from "../constants"
import { createDefaultMinValuableConfig } from "../defaults/defaults"
import { nullDevice, type HostInfo } from "../defaults/host"
import { applyEnvOverrides, type EnvRecord } from "../env/apply-env"
import { ConfigIoError } from "../errors"
import { minValuableSchema } from "../schema/agent-config.schema"

/**
 * Minimal settings for a host without a config file. Hub settings come from
 * the environment; without a hub URL the agent writes to the null device.
 */
export function createBootstrapConfig(host: Pick<HostInfo, "platform">, env: EnvRecord): MinValuableConfig {
  const config = createDefaultMinValuableConfig()
  applyEnvOverrides(config, env, { force: false })

  if (config.hubUrl === "") {
    config.ioMode = "file"
    config.outFile = nullDevice(host.platform)
  } else {
    config.ioMode = "http"
  }

  return config
}

export type GenerateBootstrapOptions = {
  codec?: StructuredCodec
  store?: ConfigFileStore
  logger?: Logger
}

/**
 * Write `config` to a new file at `filePath`, creating missing directories.
 *
 * @throws {ConfigIoError} When the file already exists or cannot be written.
 */
export async function generateBootstrapFile(
  config: MinValuableConfig,
  filePath: string,
  options: GenerateBootstrapOptions = {},
): Promise<void> {
  const logger = (options.logger ?? createNullLogger()).child({ module: "bootstrap", path: filePath })
  const store = options.store ?? new ConfigFileStore(logger)
  const codec = options.codec ?? new TomlCodec()

  if (await store.exists(filePath)) throw ConfigIoError.alreadyExists(filePath)

  let body: string
  try {
    body = encodeConfig(minValuableSchema, config, codec)
  } catch (err) {
    throw ConfigIoError.wrap("encode", filePath, err)
  }

  await store.ensureDirectory(filePath)
  await store.write(filePath, CONFIG_FILE_HEADER + body, "create")

  logger.info("generated a minimal config file", { ioMode: config.ioMode })
}
