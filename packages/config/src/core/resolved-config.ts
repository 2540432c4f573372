import { TomlCodec } from "../adapters/toml/toml-codec"
import type { AgentConfig, ReadonlyAgentConfig } from "../ports/agent-config"
import type { StructuredCodec } from "../ports/codec"
import type { IResolvedConfig, ValueOrigin } from "../ports/config"
import { dumpConfig } from "./persist/persist"
import { agentConfigSchema } from "./schema/agent-config.schema"
import { keysOf } from "./schema/descriptor"

export type ResolvedConfigInit = {
  config: AgentConfig
  path: string
  bootstrapped: boolean
  provenance: ReadonlyMap<string, ValueOrigin>
  unknownKeys: readonly string[]
  codec?: StructuredCodec
}

function deepFreeze<T extends object>(target: T): T {
  for (const value of Object.values(target)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) deepFreeze(value)
  }
  return Object.freeze(target)
}

export class ResolvedConfig implements IResolvedConfig {
  readonly path: string
  readonly bootstrapped: boolean

  private readonly config: AgentConfig
  private readonly provenance: ReadonlyMap<string, ValueOrigin>
  private readonly unknown: readonly string[]
  private readonly codec: StructuredCodec

  constructor(init: ResolvedConfigInit) {
    this.config = deepFreeze(init.config)
    this.path = init.path
    this.bootstrapped = init.bootstrapped
    this.provenance = new Map(init.provenance)
    this.unknown = [...init.unknownKeys]
    this.codec = init.codec ?? new TomlCodec()
  }

  get value(): ReadonlyAgentConfig {
    return this.config
  }

  explain(key: string): ValueOrigin {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): ValueOrigin[] {
    const origins = keysOf(agentConfigSchema, this.config).map((key) => this.explain(key))

    return [...new Set(origins)]
  }

  unknownKeys(): string[] {
    return [...this.unknown]
  }

  dump(): string {
    return dumpConfig(this.config, this.codec)
  }
}
