/**
 * Edit distance between two strings, computed one row at a time
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j)

  for (let i = 1; i <= a.length; i++) {
    const current = [i]
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1)
      current[j] = Math.min(substitution, previous[j] + 1, current[j - 1] + 1)
    }
    previous = current
  }

  return previous[b.length]
}

/**
 * Similarity score in [0, 1]; prefix and substring hits rank above plain edit distance
 */
export function similarity(input: string, candidate: string): number {
  const needle = input.toLowerCase()
  const haystack = candidate.toLowerCase()

  if (needle === haystack)
    return 1

  if (haystack.startsWith(needle))
    return 0.8 + (needle.length / haystack.length) * 0.2

  if (haystack.includes(needle))
    return 0.6 + (needle.length / haystack.length) * 0.2

  const longest = Math.max(needle.length, haystack.length)
  if (longest === 0)
    return 1

  return Math.max(0, (longest - editDistance(needle, haystack)) / longest)
}

/**
 * Names close enough to `input` to offer as "did you mean" hints, best first
 */
export function suggestNames(input: string, names: string[], maxSuggestions = 3, threshold = 0.4): string[] {
  return names
    .map(name => ({ name, score: similarity(input, name) }))
    .filter(item => item.score >= threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, maxSuggestions)
    .map(item => item.name)
}
