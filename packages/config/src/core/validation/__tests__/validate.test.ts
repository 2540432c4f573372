import type { AgentConfig } from "../../../ports/agent-config"
import { linuxHost, mockLogger, windowsHost } from "../../__tests__/helpers"
import { createDefaultConfig } from "../../defaults/defaults"
import { ConfigValidationError } from "../../errors"
import { validateConfig } from "../validate"

function linuxConfig(patch: (config: AgentConfig) => void = () => {}): AgentConfig {
  const config = createDefaultConfig(linuxHost)
  patch(config)
  return config
}

function violation(config: AgentConfig, platform: NodeJS.Platform = "linux"): unknown {
  try {
    validateConfig(config, { platform })
  } catch (err) {
    return err
  }
  return undefined
}

describe("validateConfig", () => {
  it("accepts the defaults of every platform", () => {
    expect(validateConfig(createDefaultConfig(linuxHost), { platform: "linux" })).toEqual({ corrected: [] })
    expect(validateConfig(createDefaultConfig(windowsHost), { platform: "win32" })).toEqual({ corrected: [] })
  })

  describe("hub_proxy", () => {
    it("adds a missing scheme", () => {
      const config = linuxConfig((c) => {
        c.hubProxy = "proxy.example.test:3128"
      })

      expect(validateConfig(config, { platform: "linux" }).corrected).toEqual(["hub_proxy"])
      expect(config.hubProxy).toBe("http://proxy.example.test:3128")
    })

    it("keeps a proxy that already has a scheme", () => {
      const config = linuxConfig((c) => {
        c.hubProxy = "https://proxy.example.test"
      })

      expect(validateConfig(config, { platform: "linux" }).corrected).toEqual([])
      expect(config.hubProxy).toBe("https://proxy.example.test")
    })

    it("fails on an unparseable URL", () => {
      const err = violation(linuxConfig((c) => (c.hubProxy = "http://[broken")))

      expect(err).toBeInstanceOf(ConfigValidationError)
      expect(err).toMatchObject({ message: "failed to parse 'hub_proxy' URL", context: { key: "hub_proxy" } })
    })
  })

  it.each<[string, (config: AgentConfig) => void, string, string]>([
    ["interval", (c) => (c.interval = 29.9), "interval", "interval value must be >= 30.0"],
    ["heartbeat", (c) => (c.heartbeatInterval = 4), "heartbeat", "heartbeat value must be >= 5.0"],
    [
      "operation_mode",
      (c) => (c.operationMode = "turbo"),
      "operation_mode",
      "invalid operation_mode supplied. Must be one of [full minimal heartbeat]",
    ],
    [
      "net_interface_max_speed",
      (c) => (c.netInterfaceMaxSpeed = "10X"),
      "net_interface_max_speed",
      "invalid net_interface_max_speed value supplied: unsupported unit: X",
    ],
    [
      "net_interface_max_speed out of range",
      (c) => (c.netInterfaceMaxSpeed = "1e400M"),
      "net_interface_max_speed",
      "invalid net_interface_max_speed value supplied: value out of range",
    ],
    [
      "hub_request_timeout below range",
      (c) => (c.hubRequestTimeout = 0),
      "hub_request_timeout",
      "hub_request_timeout must be between 1 and 600",
    ],
    [
      "hub_request_timeout above range",
      (c) => (c.hubRequestTimeout = 601),
      "hub_request_timeout",
      "hub_request_timeout must be between 1 and 600",
    ],
    [
      "jobmon spool_dir",
      (c) => (c.jobMonitoring.spoolDirPath = ""),
      "jobmon.spool_dir",
      "invalid [jobmon] config: spool_dir is empty",
    ],
    [
      "jobmon severity",
      (c) => (c.jobMonitoring.severity = "loud"),
      "jobmon.severity",
      "invalid [jobmon] config: severity has invalid value. Must be one of [alert warning none]",
    ],
    [
      "system_updates_checks",
      (c) => (c.systemUpdatesChecks.fetchTimeout = 20_000),
      "system_updates_checks.fetch_timeout",
      "invalid [system_updates_checks] config: fetch_timeout should be less than check_interval",
    ],
    [
      "mysql_monitoring",
      (c) => (c.mysqlMonitoring.enabled = true),
      "mysql_monitoring.connect",
      "invalid [mysql_monitoring] config: connect is empty",
    ],
    [
      "self_update",
      (c) => (c.selfUpdate.checkInterval = 300),
      "self_update.check_interval",
      "invalid [self_update] config: check_interval must be greater than 600 seconds",
    ],
  ])("rejects an invalid %s", (_name, patch, key, message) => {
    const err = violation(linuxConfig(patch))

    expect(err).toBeInstanceOf(ConfigValidationError)
    expect(err).toMatchObject({ code: "config_validation_error", message, context: { key } })
  })

  it("accepts the lower bounds", () => {
    const config = linuxConfig((c) => {
      c.interval = 30
      c.heartbeatInterval = 5
      c.hubRequestTimeout = 1
    })

    expect(violation(config)).toBeUndefined()
  })

  it("reports the first violation in rule order", () => {
    const err = violation(
      linuxConfig((c) => {
        c.heartbeatInterval = 1
        c.interval = 1
      }),
    )

    expect(err).toMatchObject({ context: { key: "interval" } })
  })

  it("checks the spool directory against windows path rules on windows", () => {
    const config = createDefaultConfig(windowsHost)
    config.jobMonitoring.spoolDirPath = "/var/lib/hostmon/jobmon"

    expect(violation(config, "win32")).toBeUndefined()

    config.jobMonitoring.spoolDirPath = "jobmon"
    expect(violation(config, "win32")).toMatchObject({ message: "invalid [jobmon] config: spool_dir path must be absolute" })
  })

  it("raises a short update check interval and reports it", () => {
    const logger = mockLogger()
    const config = linuxConfig((c) => {
      c.systemUpdatesChecks.checkInterval = 100
    })

    expect(validateConfig(config, { platform: "linux", logger }).corrected).toEqual([
      "system_updates_checks.check_interval",
    ])
    expect(config.systemUpdatesChecks.checkInterval).toBe(300)
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  describe("retry settings", () => {
    it("resets out-of-range retries to 5 and stops there by default", () => {
      const logger = mockLogger()
      const config = linuxConfig((c) => {
        c.onHttp5xxRetries = 9
        c.onHttp5xxRetryInterval = 10
      })

      const report = validateConfig(config, { platform: "linux", logger })

      expect(report.corrected).toEqual(["on_http_5xx_retries"])
      expect(config.onHttp5xxRetries).toBe(5)
      expect(config.onHttp5xxRetryInterval).toBe(10)
      expect(logger.warn).toHaveBeenCalledWith("on_http_5xx_retries value out of range (0-5). was reset to 5", {
        key: "on_http_5xx_retries",
      })
    })

    it("also checks the retry interval when asked to continue", () => {
      const config = linuxConfig((c) => {
        c.onHttp5xxRetries = -1
        c.onHttp5xxRetryInterval = 0.5
      })

      const report = validateConfig(config, { platform: "linux", stopAfterRetryClamp: false })

      expect(report.corrected).toEqual(["on_http_5xx_retries", "on_http_5xx_retry_interval"])
      expect(config.onHttp5xxRetries).toBe(5)
      expect(config.onHttp5xxRetryInterval).toBe(3)
    })

    it("resets an out-of-range interval when the retry count is valid", () => {
      const logger = mockLogger()
      const config = linuxConfig((c) => {
        c.onHttp5xxRetryInterval = 3.5
      })

      expect(validateConfig(config, { platform: "linux", logger }).corrected).toEqual(["on_http_5xx_retry_interval"])
      expect(config.onHttp5xxRetryInterval).toBe(3)
      expect(logger.warn).toHaveBeenCalledWith("on_http_5xx_retry_interval value out of range (1-3). was reset to 3", {
        key: "on_http_5xx_retry_interval",
      })
    })

    it("accepts boundary values", () => {
      const config = linuxConfig((c) => {
        c.onHttp5xxRetries = 0
        c.onHttp5xxRetryInterval = 1
      })

      expect(validateConfig(config, { platform: "linux" }).corrected).toEqual([])
    })
  })
})
