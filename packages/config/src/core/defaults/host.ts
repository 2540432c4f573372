import os from "node:os"
import path from "node:path"

/**
 * Facts about the machine the agent runs on. The only input of the
 * defaults builder.
 */
export type HostInfo = {
  platform: NodeJS.Platform

  /** Absolute path of the agent executable */
  executablePath: string

  homeDir: string
}

export type DefaultPaths = {
  configFile: string
  logFile: string
}

export function detectHost(): HostInfo {
  return {
    platform: process.platform,
    executablePath: process.execPath,
    homeDir: os.homedir(),
  }
}

/**
 * Default locations of the config and log files.
 *
 * - windows: next to the executable
 * - macOS: `~/.hostmon`
 * - everything else: `/etc/hostmon` and `/var/log/hostmon`
 */
export function defaultPaths(host: HostInfo): DefaultPaths {
  switch (host.platform) {
    case "win32": {
      const dir = path.win32.dirname(host.executablePath)

      return {
        configFile: path.win32.join(dir, "hostmon.conf"),
        logFile: path.win32.join(dir, "hostmon.log"),
      }
    }
    case "darwin":
      return {
        configFile: path.posix.join(host.homeDir, ".hostmon", "hostmon.conf"),
        logFile: path.posix.join(host.homeDir, ".hostmon", "hostmon.log"),
      }
    default:
      return {
        configFile: "/etc/hostmon/hostmon.conf",
        logFile: "/var/log/hostmon/hostmon.log",
      }
  }
}

/** Where output goes when there is nowhere to send it. */
export function nullDevice(platform: NodeJS.Platform): string {
  return platform === "win32" ? "NUL" : "/dev/null"
}

export function isAbsolutePath(platform: NodeJS.Platform, candidate: string): boolean {
  return platform === "win32" ? path.win32.isAbsolute(candidate) : path.posix.isAbsolute(candidate)
}
