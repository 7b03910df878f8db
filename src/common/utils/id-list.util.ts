/**
 * Drops duplicates (first occurrence wins) and any id listed in `exclude`.
 */
export function dedupeIds(ids: number[], exclude: number[] = []): number[] {
  const seen = new Set<number>(exclude);
  const unique: number[] = [];
  for (const id of ids) {
    if (seen.has(id)) continue;
    seen.add(id);
    unique.push(id);
  }
  return unique;
}
