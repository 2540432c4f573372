import type { z } from "zod"

/** Numeric flavour of a field; mismatches get a dedicated decode message. */
export type NumericKind = "float" | "integer"

export type FieldOptions = {
  /** Documentation written above the key when the config is dumped */
  comment?: string

  /** Written as `# key = value` while the value is empty */
  commented?: boolean

  /** Left out of the dump while the value is empty */
  omitEmpty?: boolean

  numeric?: NumericKind
}

export type TableOptions = {
  comment?: string
}

export type ApplyResult = { ok: true } | { ok: false; error: z.ZodError }

/**
 * A field descriptor bound to one config object. Reads and writes go
 * straight to the property the descriptor was declared for.
 */
export type BoundField = {
  kind: "field"
  key: string
  options: FieldOptions
  read(): unknown
  apply(raw: unknown): ApplyResult
}

export type BoundTable = {
  kind: "table"
  key: string
  options: TableOptions
  fields: readonly BoundField[]
}

export type BoundEntry = BoundField | BoundTable

export type FieldDescriptor<T> = {
  kind: "field"
  key: string
  bind(target: T): BoundField
}

export type TableDescriptor<T> = {
  kind: "table"
  key: string
  bind(target: T): BoundTable
}

export type Descriptor<T> = FieldDescriptor<T> | TableDescriptor<T>

/**
 * Typed builders for the descriptor table of `T`.
 *
 * @example
 * const d = descriptorsFor<StorCliConfig>()
 * const storCli = [d.field("binary", "binaryPath", z.string())]
 */
export function descriptorsFor<T>() {
  return {
    field<K extends keyof T & string>(
      key: string,
      prop: K,
      schema: z.ZodType<T[K]>,
      options: FieldOptions = {},
    ): FieldDescriptor<T> {
      return {
        kind: "field",
        key,
        bind: (target) => ({
          kind: "field",
          key,
          options,
          read: () => target[prop],
          apply: (raw) => {
            const result = schema.safeParse(raw)
            if (!result.success) return { ok: false, error: result.error }

            target[prop] = result.data
            return { ok: true }
          },
        }),
      }
    },

    table<K extends keyof T & string>(
      key: string,
      prop: K,
      fields: readonly FieldDescriptor<T[K]>[],
      options: TableOptions = {},
    ): TableDescriptor<T> {
      return {
        kind: "table",
        key,
        bind: (target) => {
          const nested = target[prop]

          return {
            kind: "table",
            key,
            options,
            fields: fields.map((f) => f.bind(nested)),
          }
        },
      }
    },
  }
}

export function bindAll<T>(descriptors: readonly Descriptor<T>[], target: T): BoundEntry[] {
  return descriptors.map((d) => d.bind(target))
}

/** Dotted TOML keys of every field in the table, e.g. `jobmon.spool_dir`. */
export function keysOf<T>(descriptors: readonly Descriptor<T>[], target: T): string[] {
  const keys: string[] = []

  for (const entry of bindAll(descriptors, target)) {
    if (entry.kind === "field") {
      keys.push(entry.key)
      continue
    }
    keys.push(entry.key)
    for (const field of entry.fields) keys.push(`${entry.key}.${field.key}`)
  }

  return keys
}
