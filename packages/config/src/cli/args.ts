import { parseArgs } from "node:util"
import { isLogLevelName, type LogLevelName } from "@hostmon/logger"

export type CliArgs = {
  configPath?: string
  envFile?: string
  printConfig: boolean
  reconfigure: boolean
  logLevel: LogLevelName
  pretty: boolean
  help: boolean
  version: boolean
}

export class CliUsageError extends Error {
  override readonly name = "CliUsageError"
}

export const USAGE = `Usage: hostmon-config [options]

Resolves the agent configuration, creating a minimal config file when none exists.

Options:
  -c, --config <path>     Config file (default: $HOSTMON_CONFIG or the platform default)
      --env-file <path>   Read HOSTMON_* variables from a dotenv file as well
  -p, --print-config      Print every setting with its effective value
      --reconfigure       Replace hub settings with HOSTMON_HUB_* and rewrite the file
      --log-level <level> trace | debug | info | warn | error | fatal (default: info)
      --pretty            Human-readable log output
  -h, --help              Show this help message
  -v, --version           Show version
`

function parse(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        config: { type: "string", short: "c" },
        "env-file": { type: "string" },
        "print-config": { type: "boolean", short: "p" },
        reconfigure: { type: "boolean" },
        "log-level": { type: "string" },
        pretty: { type: "boolean" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err), { cause: err })
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = parse(argv)

  const logLevel = values["log-level"] ?? "info"
  if (!isLogLevelName(logLevel)) {
    throw new CliUsageError(`invalid --log-level '${logLevel}'`)
  }

  return {
    ...(values.config !== undefined && { configPath: values.config }),
    ...(values["env-file"] !== undefined && { envFile: values["env-file"] }),
    printConfig: values["print-config"] ?? false,
    reconfigure: values.reconfigure ?? false,
    logLevel,
    pretty: values.pretty ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  }
}
