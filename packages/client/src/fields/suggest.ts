function editDistance(a: string, b: string): number {
  const previous = Array.from({ length: b.length + 1 }, (_, i) => i)
  for (let i = 1; i <= a.length; i++) {
    let diagonal = previous[0]
    previous[0] = i
    for (let j = 1; j <= b.length; j++) {
      const above = previous[j]
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      previous[j] = Math.min(previous[j] + 1, previous[j - 1] + 1, diagonal + cost)
      diagonal = above
    }
  }
  return previous[b.length]
}

/**
 * Closest candidates to `input`, nearest first. Only candidates within
 * `maxDistance` edits (default: a third of the input length, at least 2) or
 * sharing the input as a prefix are returned.
 */
export function suggestClosest(
  input: string,
  candidates: readonly string[],
  limit = 3,
  maxDistance = Math.max(2, Math.floor(input.length / 3))
): string[] {
  const needle = input.toLowerCase()
  return candidates
    .map((candidate) => ({
      candidate,
      distance: editDistance(needle, candidate.toLowerCase()),
      prefix: candidate.toLowerCase().startsWith(needle),
    }))
    .filter((entry) => entry.distance <= maxDistance || entry.prefix)
    .sort((a, b) => a.distance - b.distance || a.candidate.localeCompare(b.candidate))
    .slice(0, limit)
    .map((entry) => entry.candidate)
}
