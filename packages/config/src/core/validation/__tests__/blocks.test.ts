import { mockLogger } from "../../__tests__/helpers"
import {
  clampSystemUpdatesCheckInterval,
  validateJobMonitoring,
  validateMysqlMonitoring,
  validateSelfUpdate,
  validateSystemUpdatesChecks,
} from "../blocks"

describe("validateJobMonitoring", () => {
  const valid = { spoolDirPath: "/var/lib/hostmon/jobmon", recordStdErr: true, recordStdOut: false, severity: "alert" }

  it("accepts the defaults", () => {
    expect(validateJobMonitoring(valid, "linux")).toBeUndefined()
  })

  it("requires a spool directory", () => {
    expect(validateJobMonitoring({ ...valid, spoolDirPath: "" }, "linux")).toEqual({
      key: "spool_dir",
      message: "spool_dir is empty",
    })
  })

  it("checks absoluteness for the host platform", () => {
    expect(validateJobMonitoring({ ...valid, spoolDirPath: "jobmon" }, "linux")).toEqual({
      key: "spool_dir",
      message: "spool_dir path must be absolute",
    })
    expect(validateJobMonitoring({ ...valid, spoolDirPath: "D:\\spool" }, "win32")).toBeUndefined()
  })

  it("rejects unknown severities", () => {
    expect(validateJobMonitoring({ ...valid, severity: "critical" }, "linux")).toEqual({
      key: "severity",
      message: "severity has invalid value. Must be one of [alert warning none]",
    })
  })
})

describe("validateSystemUpdatesChecks", () => {
  it("requires fetch_timeout below check_interval", () => {
    expect(validateSystemUpdatesChecks({ enabled: true, fetchTimeout: 600, checkInterval: 600 })).toEqual({
      key: "fetch_timeout",
      message: "fetch_timeout should be less than check_interval",
    })
    expect(validateSystemUpdatesChecks({ enabled: true, fetchTimeout: 30, checkInterval: 600 })).toBeUndefined()
  })
})

describe("clampSystemUpdatesCheckInterval", () => {
  it("raises short intervals to 300 and warns", () => {
    const logger = mockLogger()
    const config = { enabled: true, fetchTimeout: 30, checkInterval: 120 }

    expect(clampSystemUpdatesCheckInterval(config, logger)).toBe(true)
    expect(config.checkInterval).toBe(300)
    expect(logger.warn).toHaveBeenCalledWith(
      "system_updates_checks.check_interval is less than minimum(300). It was set to 300",
      { key: "system_updates_checks.check_interval" },
    )
  })

  it("leaves valid intervals alone", () => {
    const logger = mockLogger()
    const config = { enabled: true, fetchTimeout: 30, checkInterval: 300 }

    expect(clampSystemUpdatesCheckInterval(config, logger)).toBe(false)
    expect(config.checkInterval).toBe(300)
    expect(logger.warn).not.toHaveBeenCalled()
  })
})

describe("validateMysqlMonitoring", () => {
  it("needs a connection string only when enabled", () => {
    expect(validateMysqlMonitoring({ enabled: false, connect: "" })).toBeUndefined()
    expect(validateMysqlMonitoring({ enabled: true, connect: "" })).toEqual({
      key: "connect",
      message: "connect is empty",
    })
    expect(validateMysqlMonitoring({ enabled: true, connect: "user:test-secret@tcp(127.0.0.1:3306)/" })).toBeUndefined()
  })
})

describe("validateSelfUpdate", () => {
  it("requires at least 600 seconds between checks", () => {
    expect(validateSelfUpdate({ enabled: true, url: "", checkInterval: 599 })).toEqual({
      key: "check_interval",
      message: "check_interval must be greater than 600 seconds",
    })
    expect(validateSelfUpdate({ enabled: true, url: "", checkInterval: 600 })).toBeUndefined()
  })
})
