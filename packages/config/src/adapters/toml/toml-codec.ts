import { parse, stringify } from "smol-toml"

import type { StructuredCodec } from "../../ports/codec"

/**
 * TOML codec backed by smol-toml.
 *
 * Parse errors are `TomlError`s, which carry `line` and `column`.
 */
export class TomlCodec implements StructuredCodec {
  readonly name = "toml"

  decode(text: string): Record<string, unknown> {
    return parse(text)
  }

  encodeValue(key: string, value: unknown): string {
    return stringify({ [key]: value }).trim()
  }
}
