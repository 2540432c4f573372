import type { Logger } from "@hostmon/logger"

import {
  jobSeverities,
  type JobMonitoringConfig,
  type MysqlMonitoringConfig,
  type SelfUpdateConfig,
  type SystemUpdatesChecksConfig,
} from "../../ports/agent-config"
import { MIN_SELF_UPDATE_CHECK_INTERVAL, MIN_SYSTEM_UPDATES_CHECK_INTERVAL } from "../constants"
import { isAbsolutePath } from "../defaults/host"

/**
 * A rule violated inside a config section. `key` is relative to the section.
 */
export type BlockViolation = {
  key: string
  message: string
}

function isJobSeverity(value: string): boolean {
  return jobSeverities.some((severity) => severity === value)
}

export function validateJobMonitoring(
  config: JobMonitoringConfig,
  platform: NodeJS.Platform,
): BlockViolation | undefined {
  if (config.spoolDirPath === "") return { key: "spool_dir", message: "spool_dir is empty" }

  if (!isAbsolutePath(platform, config.spoolDirPath)) {
    return { key: "spool_dir", message: "spool_dir path must be absolute" }
  }

  if (!isJobSeverity(config.severity)) {
    return {
      key: "severity",
      message: `severity has invalid value. Must be one of [${jobSeverities.join(" ")}]`,
    }
  }

  return undefined
}

export function validateSystemUpdatesChecks(config: SystemUpdatesChecksConfig): BlockViolation | undefined {
  if (config.fetchTimeout >= config.checkInterval) {
    return { key: "fetch_timeout", message: "fetch_timeout should be less than check_interval" }
  }
  return undefined
}

/**
 * Raises `checkInterval` to the minimum with a warning.
 *
 * @returns `true` when the interval was changed.
 */
export function clampSystemUpdatesCheckInterval(config: SystemUpdatesChecksConfig, logger: Logger): boolean {
  if (config.checkInterval >= MIN_SYSTEM_UPDATES_CHECK_INTERVAL) return false

  logger.warn(
    `system_updates_checks.check_interval is less than minimum(${MIN_SYSTEM_UPDATES_CHECK_INTERVAL}). It was set to ${MIN_SYSTEM_UPDATES_CHECK_INTERVAL}`,
    { key: "system_updates_checks.check_interval" },
  )
  config.checkInterval = MIN_SYSTEM_UPDATES_CHECK_INTERVAL
  return true
}

export function validateMysqlMonitoring(config: MysqlMonitoringConfig): BlockViolation | undefined {
  if (config.enabled && config.connect === "") {
    return { key: "connect", message: "connect is empty" }
  }
  return undefined
}

export function validateSelfUpdate(config: SelfUpdateConfig): BlockViolation | undefined {
  if (config.checkInterval < MIN_SELF_UPDATE_CHECK_INTERVAL) {
    return {
      key: "check_interval",
      message: `check_interval must be greater than ${MIN_SELF_UPDATE_CHECK_INTERVAL} seconds`,
    }
  }
  return undefined
}
