/**
 * A textual, nested, key/value document format.
 *
 * The codec only translates between text and plain values; it knows
 * nothing about the agent's schema.
 */
export interface StructuredCodec {
  /** Format name for messages, e.g. "toml" */
  readonly name: string

  /**
   * Parse a whole document into a tree of plain values.
   *
   * Throws on malformed input. Errors may carry numeric `line` and `column`
   * properties.
   */
  decode(text: string): Record<string, unknown>

  /** Render a single `key = value` line. */
  encodeValue(key: string, value: unknown): string
}
