import type { z } from "zod"

import { ConfigDecodeError } from "../errors"
import { bindAll, type BoundField, type Descriptor } from "../schema/descriptor"
import { formatKeyPath, isTable, type DecodedDocument } from "./document"

/**
 * Overlay the values present in `doc` onto `target`.
 *
 * Keys absent from the document leave the target untouched, so applying
 * the same document twice has the same effect as applying it once.
 *
 * @returns Dotted keys that were written.
 * @throws {ConfigDecodeError} When a present value does not fit its field.
 */
export function applyDocument<T>(descriptors: readonly Descriptor<T>[], target: T, doc: DecodedDocument): string[] {
  const applied: string[] = []

  for (const entry of bindAll(descriptors, target)) {
    if (entry.kind === "field") {
      if (doc.isDefined(entry.key)) {
        applyField(entry, entry.key, doc.get(entry.key))
        applied.push(entry.key)
      }
      continue
    }

    if (!doc.isDefined(entry.key)) continue
    if (!isTable(doc.get(entry.key))) {
      throw ConfigDecodeError.invalidValue(entry.key, "expected a table")
    }

    for (const field of entry.fields) {
      if (!doc.isDefined(entry.key, field.key)) continue

      const dotted = `${entry.key}.${field.key}`
      applyField(field, dotted, doc.get(entry.key, field.key))
      applied.push(dotted)
    }
  }

  return applied
}

function applyField(field: BoundField, dotted: string, raw: unknown): void {
  const result = field.apply(raw)
  if (result.ok) return

  if (field.options.numeric !== undefined && typeof raw !== "number") {
    throw ConfigDecodeError.numericMismatch(dotted, result.error)
  }
  throw ConfigDecodeError.invalidValue(dotted, firstIssue(result.error), result.error)
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid value"
}

/**
 * Keys present in the document that no descriptor table knows about.
 * Tables that are themselves known are not reported, only their unknown members.
 */
export function findUnknownKeys(doc: DecodedDocument, known: Iterable<string>): string[] {
  // descriptor keys never contain a dot, so splitting a known dotted key is exact
  const knownPaths = new Set([...known].map((key) => JSON.stringify(key.split("."))))
  const isKnown = (path: readonly string[]) => knownPaths.has(JSON.stringify(path))

  return doc
    .paths()
    .filter((path) => !isKnown(path) && (path.length === 1 || isKnown(path.slice(0, -1))))
    .map(formatKeyPath)
}
