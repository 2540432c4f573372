import type { FileHandle } from "node:fs/promises"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { createNullLogger, type Logger } from "@hostmon/logger"

import { ConfigIoError, ConfigNotFoundError, isErrnoException } from "../../core/errors"

export type WriteMode = "create" | "truncate"

/**
 * Reads and writes config files. Every failure is reported as a
 * `ConfigIoError` naming the path and the operation, except a missing file
 * on read, which is a `ConfigNotFoundError`.
 */
export class ConfigFileStore {
  private readonly logger: Logger

  constructor(logger: Logger = createNullLogger()) {
    this.logger = logger.child({ module: "config-file-store" })
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(filePath)
      return true
    } catch (err) {
      if (this.isNotFoundError(err)) return false
      throw ConfigIoError.wrap("stat", filePath, err)
    }
  }

  async read(filePath: string): Promise<string> {
    try {
      await fs.stat(filePath)
    } catch (err) {
      if (this.isNotFoundError(err)) throw ConfigNotFoundError.forPath(filePath, err)
      throw ConfigIoError.wrap("stat", filePath, err)
    }

    return this.withHandle(filePath, "r", (handle) =>
      handle.readFile("utf-8").catch((err: unknown) => {
        throw ConfigIoError.wrap("read", filePath, err)
      }),
    )
  }

  /** Creates the parent directory of `filePath`, and its parents, when missing. */
  async ensureDirectory(filePath: string): Promise<void> {
    const dir = path.dirname(filePath)

    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (err) {
      throw ConfigIoError.wrap("mkdir", dir, err)
    }
  }

  /**
   * Writes `text` to `filePath`.
   *
   * - `create`: fails with "already exists" when the file is present.
   * - `truncate`: replaces any previous content.
   */
  async write(filePath: string, text: string, mode: WriteMode): Promise<void> {
    const flags = mode === "create" ? "wx" : "w"

    await this.withHandle(filePath, flags, (handle) =>
      handle.writeFile(text, "utf-8").catch((err: unknown) => {
        throw ConfigIoError.wrap("write", filePath, err)
      }),
    )
  }

  private async withHandle<T>(filePath: string, flags: string, fn: (handle: FileHandle) => Promise<T>): Promise<T> {
    let handle: FileHandle

    try {
      handle = await fs.open(filePath, flags, 0o644)
    } catch (err) {
      if (flags === "wx" && isErrnoException(err) && err.code === "EEXIST") {
        throw ConfigIoError.alreadyExists(filePath)
      }
      if (this.isNotFoundError(err) && flags === "r") throw ConfigNotFoundError.forPath(filePath, err)
      throw ConfigIoError.wrap("open", filePath, err)
    }

    let result: T
    try {
      result = await fn(handle)
    } catch (err) {
      await handle.close().catch((closeErr: unknown) => {
        this.logger.warn("failed to close config file", { path: filePath, err: closeErr })
      })
      throw err
    }

    try {
      await handle.close()
    } catch (err) {
      throw ConfigIoError.wrap("close", filePath, err)
    }

    return result
  }

  private isNotFoundError(err: unknown): boolean {
    return isErrnoException(err) && err.code === "ENOENT"
  }
}
