type Tree = Record<string, unknown>

export function isTable(value: unknown): value is Tree {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Renders a key path for messages. A segment that itself contains a dot was
 * a quoted key in the file and stays quoted: `"jobmon.spool_dir"` is one
 * top-level key, `jobmon.spool_dir` a member of `[jobmon]`.
 */
export function formatKeyPath(path: readonly string[]): string {
  return path.map((segment) => (segment.includes(".") ? JSON.stringify(segment) : segment)).join(".")
}

/**
 * The result of decoding a config file once: the value tree, queried for
 * the keys literally present in the text.
 *
 * Merging and migration both consult the same instance, so a key is
 * "defined" for one stage exactly when it is for the other.
 */
export class DecodedDocument {
  constructor(
    readonly tree: Tree,
    readonly origin: string,
  ) {}

  static empty(origin: string): DecodedDocument {
    return new DecodedDocument({}, origin)
  }

  /** `true` when the key at `path` appears in the document, e.g. `isDefined("jobmon", "spool_dir")`. */
  isDefined(...path: string[]): boolean {
    let node: unknown = this.tree

    for (const segment of path) {
      if (!isTable(node) || !Object.hasOwn(node, segment)) return false
      node = node[segment]
    }

    return path.length > 0
  }

  get(...path: string[]): unknown {
    let node: unknown = this.tree

    for (const segment of path) {
      if (!isTable(node)) return undefined
      node = node[segment]
    }

    return node
  }

  /** Path of every key in the document, tables included, parents first. */
  paths(): string[][] {
    return collectPaths(this.tree, [])
  }

  /** Every key rendered with {@link formatKeyPath}. */
  keys(): string[] {
    return this.paths().map(formatKeyPath)
  }
}

function collectPaths(tree: Tree, prefix: string[]): string[][] {
  const paths: string[][] = []

  for (const [key, value] of Object.entries(tree)) {
    const path = [...prefix, key]
    paths.push(path)
    if (isTable(value)) paths.push(...collectPaths(value, path))
  }

  return paths
}
