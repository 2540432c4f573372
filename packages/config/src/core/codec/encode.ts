import type { StructuredCodec } from "../../ports/codec"
import { bindAll, type BoundField, type Descriptor } from "../schema/descriptor"

function isEmpty(value: unknown): boolean {
  return value === "" || value === 0 || value === false || (Array.isArray(value) && value.length === 0)
}

function commentLines(comment: string | undefined): string[] {
  if (comment === undefined || comment === "") return []
  return comment.split("\n").map((line) => (line === "" ? "#" : `# ${line}`))
}

function encodeField(field: BoundField, codec: StructuredCodec): string[] {
  const value = field.read()
  const empty = isEmpty(value)

  if (field.options.omitEmpty && empty) return []

  const line = codec.encodeValue(field.key, value)

  return [...commentLines(field.options.comment), field.options.commented && empty ? `# ${line}` : line]
}

/**
 * Render `target` as a commented document, top-level keys first, then one
 * section per table.
 */
export function encodeConfig<T>(descriptors: readonly Descriptor<T>[], target: T, codec: StructuredCodec): string {
  const entries = bindAll(descriptors, target)
  const lines: string[] = []

  for (const entry of entries) {
    if (entry.kind === "field") lines.push(...encodeField(entry, codec))
  }

  for (const entry of entries) {
    if (entry.kind !== "table") continue

    const body = entry.fields.flatMap((field) => encodeField(field, codec))

    lines.push("", ...commentLines(entry.options.comment), `[${entry.key}]`, ...body)
  }

  return `${lines.join("\n")}\n`
}
