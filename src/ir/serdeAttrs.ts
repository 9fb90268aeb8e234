/**
 * Reads the serialization attributes of an item, e.g. `#[serde(tag = "type", content = "value")]`
 * or `#[serde(default)]`. Flags map to `true`, `key = "value"` pairs to their value.
 */
export function parseSerdeAttrs(attrs: readonly string[]): Map<string, string | true> {
  const out = new Map<string, string | true>();
  for (const attr of attrs) {
    const m = /^#\[serde\((.*)\)\]$/s.exec(attr.trim());
    if (!m) continue;
    const entry = /([A-Za-z_][A-Za-z0-9_]*)(?:\s*=\s*"((?:[^"\\]|\\.)*)")?/g;
    for (let e = entry.exec(m[1]); e; e = entry.exec(m[1])) {
      out.set(e[1], e[2] ?? true);
    }
  }
  return out;
}

export function serdeValue(attrs: readonly string[], key: string): string | null {
  const v = parseSerdeAttrs(attrs).get(key);
  return typeof v === 'string' ? v : null;
}

export function hasSerdeFlag(attrs: readonly string[], flag: string): boolean {
  return parseSerdeAttrs(attrs).has(flag);
}
