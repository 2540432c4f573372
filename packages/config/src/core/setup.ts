import { createNullLogger, type Logger } from "@hostmon/logger"

import { ConfigFileStore } from "../adapters/fs/config-file-store"
import { TomlCodec } from "../adapters/toml/toml-codec"
import type { AgentConfig } from "../ports/agent-config"
import type { StructuredCodec } from "../ports/codec"
import type { ValueOrigin } from "../ports/config"
import { createBootstrapConfig, generateBootstrapFile } from "./bootstrap/bootstrap"
import { findUnknownKeys } from "./codec/decode"
import { DecodedDocument } from "./codec/document"
import { createDefaultConfig, createDeprecatedConfig } from "./defaults/defaults"
import { detectHost, type HostInfo } from "./defaults/host"
import { applyEnvOverrides, type EnvRecord } from "./env/apply-env"
import { ConfigDecodeError, ConfigNotFoundError } from "./errors"
import { mergeConfigDocument, readConfigDocument } from "./merge/merge-file"
import { migrateDeprecated } from "./migrate/migrate-deprecated"
import { saveConfigFile } from "./persist/persist"
import { ResolvedConfig } from "./resolved-config"
import { agentConfigSchema, deprecatedSchema, minValuableSchema } from "./schema/agent-config.schema"
import { keysOf } from "./schema/descriptor"
import { validateConfig } from "./validation/validate"

export type SetupConfigOptions = {
  /** Config file to read, or to create when missing */
  path: string

  /** @default detectHost() */
  host?: HostInfo

  /** @default process.env */
  env?: EnvRecord

  codec?: StructuredCodec
  store?: ConfigFileStore
  logger?: Logger

  /** Stop validating once `on_http_5xx_retries` has been reset. Defaults to `true`. */
  stopAfterRetryClamp?: boolean
}

type Loaded = {
  config: AgentConfig
  doc: DecodedDocument
  bootstrapped: boolean
  provenance: Map<string, ValueOrigin>
}

type Context = {
  path: string
  host: HostInfo
  env: EnvRecord
  codec: StructuredCodec
  store: ConfigFileStore
  logger: Logger
  stopAfterRetryClamp: boolean
}

function contextOf(options: SetupConfigOptions): Context {
  const host = options.host ?? detectHost()
  const logger = (options.logger ?? createNullLogger()).child({
    module: "setup",
    path: options.path,
    platform: host.platform,
  })

  return {
    path: options.path,
    host,
    env: options.env ?? process.env,
    codec: options.codec ?? new TomlCodec(),
    store: options.store ?? new ConfigFileStore(logger),
    logger,
    stopAfterRetryClamp: options.stopAfterRetryClamp ?? true,
  }
}

function record(provenance: Map<string, ValueOrigin>, keys: readonly string[], origin: ValueOrigin): void {
  for (const key of keys) provenance.set(key, origin)
}

async function load(ctx: Context): Promise<Loaded> {
  const config = createDefaultConfig(ctx.host)
  const provenance = new Map<string, ValueOrigin>()

  let doc: DecodedDocument
  try {
    doc = await readConfigDocument(ctx.path, { codec: ctx.codec, store: ctx.store })
  } catch (err) {
    if (err instanceof ConfigDecodeError) throw err.withPath(ctx.path)
    if (!(err instanceof ConfigNotFoundError)) throw err

    ctx.logger.info("config file not found, generating a minimal one")

    const minimal = createBootstrapConfig(ctx.host, ctx.env)
    await generateBootstrapFile(minimal, ctx.path, { codec: ctx.codec, store: ctx.store, logger: ctx.logger })

    Object.assign(config, minimal)
    record(provenance, keysOf(minValuableSchema, minimal), "bootstrap")

    return { config, doc: DecodedDocument.empty(ctx.path), bootstrapped: true, provenance }
  }

  try {
    record(provenance, mergeConfigDocument(config, doc), `file:${ctx.path}`)
  } catch (err) {
    if (err instanceof ConfigDecodeError) throw err.withPath(ctx.path)
    throw err
  }

  record(provenance, migrateDeprecated(config, doc, { platform: ctx.host.platform, logger: ctx.logger }), "migration")

  return { config, doc, bootstrapped: false, provenance }
}

function finish(ctx: Context, loaded: Loaded): ResolvedConfig {
  const report = validateConfig(loaded.config, {
    platform: ctx.host.platform,
    logger: ctx.logger,
    stopAfterRetryClamp: ctx.stopAfterRetryClamp,
  })
  record(loaded.provenance, report.corrected, "validation")

  const known = [...keysOf(agentConfigSchema, loaded.config), ...keysOf(deprecatedSchema, createDeprecatedConfig())]
  const unknownKeys = findUnknownKeys(loaded.doc, known)

  if (unknownKeys.length > 0) {
    ctx.logger.warn(`ignoring unknown config keys: ${unknownKeys.join(", ")}`)
  }

  return new ResolvedConfig({
    config: loaded.config,
    path: ctx.path,
    bootstrapped: loaded.bootstrapped,
    provenance: loaded.provenance,
    unknownKeys,
    codec: ctx.codec,
  })
}

/**
 * Resolve the agent configuration: defaults, then the config file, then
 * validation. When the file does not exist a minimal one is written first,
 * filled from the environment.
 *
 * @throws {ConfigDecodeError} The file is malformed or a value has the wrong type.
 * @throws {ConfigValidationError} A setting breaks a rule.
 * @throws {ConfigIoError} The file cannot be read, or a new one cannot be written.
 */
export async function setupConfig(options: SetupConfigOptions): Promise<ResolvedConfig> {
  const ctx = contextOf(options)
  const loaded = await load(ctx)

  return finish(ctx, loaded)
}

/**
 * Resolve the configuration, replace the hub settings with the ones from the
 * environment, and rewrite the file with every setting.
 */
export async function reconfigureFromEnv(options: SetupConfigOptions): Promise<ResolvedConfig> {
  const ctx = contextOf(options)
  const loaded = await load(ctx)

  record(loaded.provenance, applyEnvOverrides(loaded.config, ctx.env, { force: true }), "env")

  if (loaded.config.hubUrl !== "" && loaded.config.ioMode !== "http") {
    loaded.config.ioMode = "http"
    record(loaded.provenance, ["io_mode"], "env")
  }

  const resolved = finish(ctx, loaded)

  await saveConfigFile(loaded.config, ctx.path, { codec: ctx.codec, store: ctx.store })
  ctx.logger.info("config file rewritten from environment")

  return resolved
}
