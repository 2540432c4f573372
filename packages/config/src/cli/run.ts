import { createRequire } from "node:module"
import { toAppError } from "@hostmon/errors"
import { createPinoLogger, type Logger } from "@hostmon/logger"
import { z } from "zod"

import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { defaultPaths, detectHost, type HostInfo } from "../core/defaults/host"
import { loadEnvironment } from "../core/env/apply-env"
import { reconfigureFromEnv, setupConfig } from "../core/setup"
import type { EnvironmentSource } from "../ports/environment-source"
import { parseCliArgs, USAGE, type CliArgs } from "./args"

export const ENV_CONFIG_PATH = "HOSTMON_CONFIG"

type Writable = { write(chunk: string): unknown }

export type CliDeps = {
  stdout: Writable
  env: Record<string, string | undefined>
  host?: HostInfo

  /** Builds the logger once the log level is known. Logs go to stderr by default. */
  createLogger?: (args: CliArgs) => Logger
}

const packageJson = z.object({ version: z.string() })

export function readVersion(): string {
  const require = createRequire(import.meta.url)
  return packageJson.parse(require("../../package.json")).version
}

function defaultLogger(args: CliArgs): Logger {
  return createPinoLogger(
    {},
    { level: args.logLevel, prettify: args.pretty, target: "stderr" },
    { service: "hostmon-config" },
  )
}

/**
 * Entry point of `hostmon-config`.
 *
 * @returns Process exit code.
 */
export async function run(argv: readonly string[], deps: CliDeps): Promise<number> {
  const args = parseCliArgs(argv)

  if (args.help) {
    deps.stdout.write(USAGE)
    return 0
  }
  if (args.version) {
    deps.stdout.write(`${readVersion()}\n`)
    return 0
  }

  const logger = (deps.createLogger ?? defaultLogger)(args)
  const host = deps.host ?? detectHost()
  const path = args.configPath ?? deps.env[ENV_CONFIG_PATH] ?? defaultPaths(host).configFile

  try {
    const sources: EnvironmentSource[] = [new EnvSource({ env: deps.env, prefix: "HOSTMON_" })]
    if (args.envFile !== undefined) sources.push(new DotenvSource({ file: args.envFile, required: true }))

    const env = await loadEnvironment(sources)
    const options = { path, host, env, logger }

    const resolved = args.reconfigure ? await reconfigureFromEnv(options) : await setupConfig(options)

    logger.info("configuration resolved", {
      path: resolved.path,
      bootstrapped: resolved.bootstrapped,
      sources: resolved.sourcesUsed(),
    })

    if (args.printConfig) deps.stdout.write(resolved.dump())

    return 0
  } catch (err) {
    const error = toAppError(err, "cli_error")
    logger.fatal("failed to resolve configuration", { path, code: error.code, err: error })
    return 1
  }
}
