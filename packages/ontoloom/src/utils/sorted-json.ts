/**
 * JSON replacer that sorts object keys for deterministic serialization.
 */
function sortedReplacer(_key: string, value: unknown): unknown {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).toSorted(([a], [b]) =>
      a < b ? -1
      : a > b ? 1
      : 0,
    )) {
      sorted[key] = entry;
    }
    return sorted;
  }
  return value;
}

/**
 * Serializes a value with object keys in sorted order, so equal values
 * always produce identical text.
 */
export function sortedJsonStringify(value: unknown): string {
  return JSON.stringify(value, sortedReplacer);
}
