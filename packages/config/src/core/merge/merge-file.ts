import { ConfigFileStore } from "../../adapters/fs/config-file-store"
import { TomlCodec } from "../../adapters/toml/toml-codec"
import type { AgentConfig } from "../../ports/agent-config"
import type { StructuredCodec } from "../../ports/codec"
import { applyDocument } from "../codec/decode"
import { DecodedDocument } from "../codec/document"
import { ConfigDecodeError } from "../errors"
import { agentConfigSchema } from "../schema/agent-config.schema"

export type ReadConfigOptions = {
  codec?: StructuredCodec
  store?: ConfigFileStore
}

/**
 * Read and decode the config file at `filePath`.
 *
 * @throws {ConfigNotFoundError} When the file does not exist.
 * @throws {ConfigIoError} When the file cannot be opened or read.
 * @throws {ConfigDecodeError} When the text is not a valid document.
 */
export async function readConfigDocument(filePath: string, options: ReadConfigOptions = {}): Promise<DecodedDocument> {
  const codec = options.codec ?? new TomlCodec()
  const store = options.store ?? new ConfigFileStore()

  const text = await store.read(filePath)

  let tree: Record<string, unknown>
  try {
    tree = codec.decode(text)
  } catch (err) {
    throw ConfigDecodeError.syntax(filePath, err)
  }

  return new DecodedDocument(tree, filePath)
}

/**
 * Overlay the keys present in `doc` onto `config`. Unknown keys are ignored.
 *
 * @returns Dotted keys taken from the document.
 */
export function mergeConfigDocument(config: AgentConfig, doc: DecodedDocument): string[] {
  return applyDocument(agentConfigSchema, config, doc)
}
