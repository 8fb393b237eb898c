/**
 * Name suggestions for misspelled identifiers and commands.
 */

/**
 * Minimum number of single-character edits turning `a` into `b`.
 */
export function editDistance(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }

  return prev[b.length];
}

/**
 * Candidates within `maxDistance` edits of `target`, closest first.
 */
export function suggestNames(
  target: string,
  candidates: Iterable<string>,
  maxDistance: number = 2
): string[] {
  const scored: { name: string; distance: number }[] = [];
  for (const name of new Set(candidates)) {
    if (name === target) continue;
    const distance = editDistance(target, name);
    if (distance <= maxDistance) {
      scored.push({ name, distance });
    }
  }
  scored.sort((a, b) => a.distance - b.distance || a.name.localeCompare(b.name));
  return scored.map((s) => s.name);
}
