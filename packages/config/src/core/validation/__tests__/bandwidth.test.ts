import { BandwidthParseError } from "../../errors"
import { parseBandwidth } from "../bandwidth"

describe("parseBandwidth", () => {
  it("treats an empty value as not configured", () => {
    expect(parseBandwidth("")).toBe(0)
  })

  it("multiplies by the unit", () => {
    expect(parseBandwidth("125M")).toBe(125_000_000)
    expect(parseBandwidth("12.5M")).toBe(12_500_000)
    expect(parseBandwidth("12.5G")).toBe(12_500_000_000)
    expect(parseBandwidth("2K")).toBe(2000)
  })

  it("truncates fractional bytes", () => {
    expect(parseBandwidth("0.0015K")).toBe(1)
  })

  it.each([
    ["5", "can't parse"],
    ["M", "can't parse"],
    ["-5M", "should be > 0.0"],
    ["0M", "should be > 0.0"],
    ["5X", "unsupported unit: X"],
    ["12T", "unsupported unit: T"],
    ["12m", "unsupported unit: m"],
    ["abc", "invalid number 'ab'"],
    ["abcM", "invalid number 'abc'"],
    ["1e400M", "value out of range"],
    ["-1e400M", "value out of range"],
    ["1e306G", "value out of range"],
  ])("rejects %j with %j", (input, reason) => {
    let thrown: unknown
    try {
      parseBandwidth(input)
    } catch (err) {
      thrown = err
    }

    expect(thrown).toBeInstanceOf(BandwidthParseError)
    expect(thrown).toMatchObject({ message: reason })
  })

  it("keeps the input in the error context", () => {
    try {
      parseBandwidth("12T")
      expect.unreachable()
    } catch (err) {
      expect(err).toMatchObject({ code: "bandwidth_parse_error", context: { input: "12T" } })
    }
  })
})
