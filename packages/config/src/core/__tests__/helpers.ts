import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { Logger } from "@hostmon/logger"
import { mock, type MockProxy } from "vitest-mock-extended"

import type { HostInfo } from "../defaults/host"

export const linuxHost: HostInfo = {
  platform: "linux",
  executablePath: "/usr/bin/hostmon",
  homeDir: "/home/agent",
}

export const windowsHost: HostInfo = {
  platform: "win32",
  executablePath: "C:\\Program Files\\hostmon\\hostmon.exe",
  homeDir: "C:\\Users\\agent",
}

export const macHost: HostInfo = {
  platform: "darwin",
  executablePath: "/usr/local/bin/hostmon",
  homeDir: "/Users/agent",
}

/** A logger mock whose children log to the same mock. */
export function mockLogger(): MockProxy<Logger> {
  const logger = mock<Logger>()
  logger.child.mockImplementation(() => logger)
  return logger
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hostmon-config-"))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}
