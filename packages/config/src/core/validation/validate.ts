import { createNullLogger, type Logger } from "@hostmon/logger"

import { operationModes, type AgentConfig } from "../../ports/agent-config"
import {
  MAX_HTTP_5XX_RETRIES,
  MAX_HTTP_5XX_RETRY_INTERVAL,
  MAX_HUB_REQUEST_TIMEOUT,
  MIN_HEARTBEAT_INTERVAL,
  MIN_HTTP_5XX_RETRY_INTERVAL,
  MIN_HUB_REQUEST_TIMEOUT,
  MIN_INTERVAL,
} from "../constants"
import { ConfigValidationError } from "../errors"
import { parseBandwidth } from "./bandwidth"
import {
  clampSystemUpdatesCheckInterval,
  validateJobMonitoring,
  validateMysqlMonitoring,
  validateSelfUpdate,
  validateSystemUpdatesChecks,
  type BlockViolation,
} from "./blocks"

export type ValidateOptions = {
  platform: NodeJS.Platform
  logger?: Logger

  /**
   * Stop after `on_http_5xx_retries` had to be reset, leaving
   * `on_http_5xx_retry_interval` unchecked.
   *
   * @default true
   */
  stopAfterRetryClamp?: boolean
}

export type ValidationReport = {
  /** Dotted keys whose value was corrected in place */
  corrected: string[]
}

function isOperationMode(value: string): boolean {
  return operationModes.some((mode) => mode === value)
}

function failBlock(section: string, violation: BlockViolation | undefined): void {
  if (violation === undefined) return

  throw ConfigValidationError.forKey(
    `${section}.${violation.key}`,
    `invalid [${section}] config: ${violation.message}`,
  )
}

/**
 * Check and sanitize `config` in place. Rules run in a fixed order and the
 * first violation is thrown.
 *
 * @throws {ConfigValidationError}
 */
export function validateConfig(config: AgentConfig, options: ValidateOptions): ValidationReport {
  const logger = (options.logger ?? createNullLogger()).child({ module: "validate" })
  const corrected: string[] = []

  if (config.hubProxy !== "") {
    if (!config.hubProxy.startsWith("http")) {
      config.hubProxy = `http://${config.hubProxy}`
      corrected.push("hub_proxy")
    }

    try {
      new URL(config.hubProxy)
    } catch (err) {
      throw ConfigValidationError.forKey("hub_proxy", "failed to parse 'hub_proxy' URL", err)
    }
  }

  if (config.interval < MIN_INTERVAL) {
    throw ConfigValidationError.forKey("interval", `interval value must be >= ${MIN_INTERVAL.toFixed(1)}`)
  }

  if (config.heartbeatInterval < MIN_HEARTBEAT_INTERVAL) {
    throw ConfigValidationError.forKey(
      "heartbeat",
      `heartbeat value must be >= ${MIN_HEARTBEAT_INTERVAL.toFixed(1)}`,
    )
  }

  if (!isOperationMode(config.operationMode)) {
    throw ConfigValidationError.forKey(
      "operation_mode",
      `invalid operation_mode supplied. Must be one of [${operationModes.join(" ")}]`,
    )
  }

  try {
    parseBandwidth(config.netInterfaceMaxSpeed)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw ConfigValidationError.forKey(
      "net_interface_max_speed",
      `invalid net_interface_max_speed value supplied: ${reason}`,
      err,
    )
  }

  if (config.hubRequestTimeout < MIN_HUB_REQUEST_TIMEOUT || config.hubRequestTimeout > MAX_HUB_REQUEST_TIMEOUT) {
    throw ConfigValidationError.forKey(
      "hub_request_timeout",
      `hub_request_timeout must be between ${MIN_HUB_REQUEST_TIMEOUT} and ${MAX_HUB_REQUEST_TIMEOUT}`,
    )
  }

  failBlock("jobmon", validateJobMonitoring(config.jobMonitoring, options.platform))

  failBlock("system_updates_checks", validateSystemUpdatesChecks(config.systemUpdatesChecks))
  if (clampSystemUpdatesCheckInterval(config.systemUpdatesChecks, logger)) {
    corrected.push("system_updates_checks.check_interval")
  }

  failBlock("mysql_monitoring", validateMysqlMonitoring(config.mysqlMonitoring))
  failBlock("self_update", validateSelfUpdate(config.selfUpdate))

  if (config.onHttp5xxRetries < 0 || config.onHttp5xxRetries > MAX_HTTP_5XX_RETRIES) {
    config.onHttp5xxRetries = MAX_HTTP_5XX_RETRIES
    corrected.push("on_http_5xx_retries")
    logger.warn(
      `on_http_5xx_retries value out of range (0-${MAX_HTTP_5XX_RETRIES}). was reset to ${MAX_HTTP_5XX_RETRIES}`,
      { key: "on_http_5xx_retries" },
    )

    if (options.stopAfterRetryClamp ?? true) return { corrected }
  }

  if (
    config.onHttp5xxRetryInterval < MIN_HTTP_5XX_RETRY_INTERVAL ||
    config.onHttp5xxRetryInterval > MAX_HTTP_5XX_RETRY_INTERVAL
  ) {
    config.onHttp5xxRetryInterval = MAX_HTTP_5XX_RETRY_INTERVAL
    corrected.push("on_http_5xx_retry_interval")
    logger.warn(
      `on_http_5xx_retry_interval value out of range (${MIN_HTTP_5XX_RETRY_INTERVAL}-${MAX_HTTP_5XX_RETRY_INTERVAL}). was reset to ${MAX_HTTP_5XX_RETRY_INTERVAL}`,
      { key: "on_http_5xx_retry_interval" },
    )
  }

  return { corrected }
}
