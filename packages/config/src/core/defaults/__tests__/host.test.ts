import { linuxHost, macHost, windowsHost } from "../../__tests__/helpers"
import { defaultPaths, detectHost, isAbsolutePath, nullDevice } from "../host"

describe("defaultPaths", () => {
  it("places config and log next to the executable on windows", () => {
    expect(defaultPaths(windowsHost)).toEqual({
      configFile: "C:\\Program Files\\hostmon\\hostmon.conf",
      logFile: "C:\\Program Files\\hostmon\\hostmon.log",
    })
  })

  it("uses the home directory on macOS", () => {
    expect(defaultPaths(macHost)).toEqual({
      configFile: "/Users/agent/.hostmon/hostmon.conf",
      logFile: "/Users/agent/.hostmon/hostmon.log",
    })
  })

  it("uses /etc and /var/log elsewhere", () => {
    expect(defaultPaths(linuxHost)).toEqual({
      configFile: "/etc/hostmon/hostmon.conf",
      logFile: "/var/log/hostmon/hostmon.log",
    })
    expect(defaultPaths({ ...linuxHost, platform: "freebsd" }).configFile).toBe("/etc/hostmon/hostmon.conf")
  })
})

describe("nullDevice", () => {
  it("is NUL on windows and /dev/null elsewhere", () => {
    expect(nullDevice("win32")).toBe("NUL")
    expect(nullDevice("linux")).toBe("/dev/null")
    expect(nullDevice("darwin")).toBe("/dev/null")
  })
})

describe("isAbsolutePath", () => {
  it("follows the rules of the given platform", () => {
    expect(isAbsolutePath("win32", "C:\\ProgramData\\hostmon")).toBe(true)
    expect(isAbsolutePath("win32", "jobmon")).toBe(false)
    expect(isAbsolutePath("linux", "/var/lib/hostmon")).toBe(true)
    expect(isAbsolutePath("linux", "C:\\ProgramData\\hostmon")).toBe(false)
    expect(isAbsolutePath("linux", "var/lib")).toBe(false)
  })
})

describe("detectHost", () => {
  it("reads the current process", () => {
    const host = detectHost()

    expect(host.platform).toBe(process.platform)
    expect(host.executablePath).toBe(process.execPath)
    expect(host.homeDir).not.toBe("")
  })
})
