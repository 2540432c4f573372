import type { EnvironmentSource } from "../../ports/environment-source"

export type EnvSourceOptions = {
  /** Only variables whose name starts with the prefix are loaded. Names are kept whole. */
  prefix?: string

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements EnvironmentSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string>> {
    const loaded: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined && key.startsWith(this.prefix)) loaded[key] = value
    }

    return loaded
  }
}
