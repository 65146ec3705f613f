/**
 * Stable uniqueness filter: first occurrence wins, later duplicates are dropped.
 * Comparison is by exact string value.
 */
export function dedupe(items: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const item of items) {
    if (!seen.has(item)) {
      seen.add(item);
      result.push(item);
    }
  }

  return result;
}
