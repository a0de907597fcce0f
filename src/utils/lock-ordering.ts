/**
 * Returns a deduplicated, sorted list of ids.
 * Every multi-row lock is taken in this order so two writers never wait on each other in a cycle.
 */
export function getLockOrder(ids: string[]): string[] {
  const unique = Array.from(new Set(ids));

  // Plain code-unit comparison: the same order Postgres uses for uuid text under the C collation
  unique.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  return unique;
}
