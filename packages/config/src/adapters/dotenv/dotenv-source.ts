import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigIoError, ConfigNotFoundError, isErrnoException } from "../../core/errors"
import type { EnvironmentSource } from "../../ports/environment-source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. e.g. "/etc/hostmon/hostmon.env" */
  file: string

  /** A missing optional file loads nothing; a missing required one is a ConfigNotFoundError. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/**
 * Hub credentials kept in a dotenv file, for hosts where the service
 * manager does not pass an environment to the agent.
 */
export class DotenvSource implements EnvironmentSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") throw ConfigIoError.wrap("read", filePath, err)
      if (this.opts.required) throw ConfigNotFoundError.forPath(filePath)
      return {}
    }

    return parse(content)
  }
}
