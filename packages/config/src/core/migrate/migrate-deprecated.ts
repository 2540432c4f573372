import { createNullLogger, type Logger } from "@hostmon/logger"

import type { AgentConfig } from "../../ports/agent-config"
import { applyDocument } from "../codec/decode"
import type { DecodedDocument } from "../codec/document"
import { createDeprecatedConfig } from "../defaults/defaults"
import { deprecatedSchema } from "../schema/agent-config.schema"

export const WINDOWS_UPDATES_WATCHER_INTERVAL = "windows_updates_watcher_interval"

export type MigrateOptions = {
  platform: NodeJS.Platform
  logger?: Logger
}

/**
 * Translate keys that were removed from the schema into their replacements.
 *
 * `windows_updates_watcher_interval` (windows only): a value <= 0 disables
 * update checks, a positive value becomes `system_updates_checks.check_interval`.
 * A replacement key set explicitly in the same document wins.
 *
 * @returns Dotted keys of `config` written by the migration.
 */
export function migrateDeprecated(config: AgentConfig, doc: DecodedDocument, options: MigrateOptions): string[] {
  const logger = (options.logger ?? createNullLogger()).child({ module: "migrate", path: doc.origin })

  if (options.platform !== "win32" || !doc.isDefined(WINDOWS_UPDATES_WATCHER_INTERVAL)) return []

  const deprecated = createDeprecatedConfig()
  applyDocument(deprecatedSchema, deprecated, doc)

  const interval = deprecated.windowsUpdatesWatcherInterval
  const target = interval > 0 ? "check_interval" : "enabled"

  if (doc.isDefined("system_updates_checks", target)) {
    logger.warn(`ignoring deprecated '${WINDOWS_UPDATES_WATCHER_INTERVAL}', 'system_updates_checks.${target}' is set`, {
      key: WINDOWS_UPDATES_WATCHER_INTERVAL,
    })
    return []
  }

  if (interval > 0) {
    config.systemUpdatesChecks.checkInterval = interval
  } else {
    config.systemUpdatesChecks.enabled = false
  }

  logger.info(`migrated deprecated '${WINDOWS_UPDATES_WATCHER_INTERVAL}' to 'system_updates_checks.${target}'`, {
    key: WINDOWS_UPDATES_WATCHER_INTERVAL,
  })

  return [`system_updates_checks.${target}`]
}
