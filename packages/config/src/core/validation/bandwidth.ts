import { BandwidthParseError } from "../errors"

const multipliers: Readonly<Record<string, number>> = {
  K: 1e3,
  M: 1e6,
  G: 1e9,
}

const decimal = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parse a bandwidth such as "12.5M" into bytes per second.
 *
 * An empty string means "not configured" and parses to 0.
 *
 * @throws {BandwidthParseError}
 */
export function parseBandwidth(text: string): number {
  if (text === "") return 0
  if (text.length < 2) throw BandwidthParseError.because(text, "can't parse")

  const amount = text.slice(0, -1)
  const unit = text.slice(-1)

  if (!decimal.test(amount)) {
    throw BandwidthParseError.because(text, `invalid number '${amount}'`)
  }

  const value = Number(amount)
  if (!Number.isFinite(value)) throw BandwidthParseError.because(text, "value out of range")
  if (value <= 0) throw BandwidthParseError.because(text, "should be > 0.0")

  const multiplier = multipliers[unit]
  if (multiplier === undefined) throw BandwidthParseError.because(text, `unsupported unit: ${unit}`)

  const bytes = value * multiplier
  if (!Number.isFinite(bytes)) throw BandwidthParseError.because(text, "value out of range")

  return Math.trunc(bytes)
}
