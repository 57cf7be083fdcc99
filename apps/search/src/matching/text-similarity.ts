/**
 * Text Similarity Module
 *
 * Fuzzy string measures for comparing product titles with each other and
 * with the search query. Every measure returns a value in [0, 1] and returns
 * 0 when either side is empty.
 */

/**
 * Lowercase, replace anything that is not a letter or digit with a space,
 * collapse whitespace.
 */
export function processText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
}

export function tokenize(text: string): string[] {
  const processed = processText(text)
  return processed ? processed.split(' ') : []
}

/**
 * Length of the longest common subsequence, two-row DP.
 */
function lcsLength(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0)
  let current = new Array<number>(b.length + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a[i - 1] === b[j - 1] ? (previous[j - 1] ?? 0) + 1 : Math.max(previous[j] ?? 0, current[j - 1] ?? 0)
    }
    const swap = previous
    previous = current
    current = swap
  }

  return previous[b.length] ?? 0
}

/**
 * Indel similarity: 2 * LCS / (|a| + |b|).
 */
export function ratio(a: string, b: string): number {
  if (!a || !b) return 0
  if (a === b) return 1
  return (2 * lcsLength(a, b)) / (a.length + b.length)
}

/**
 * Best `ratio` of the shorter string against every window of the same
 * length in the longer one. Inputs are lowercased.
 */
export function partialRatio(a: string, b: string): number {
  if (!a || !b) return 0

  const first = a.toLowerCase()
  const second = b.toLowerCase()
  const [shorter, longer] = first.length <= second.length ? [first, second] : [second, first]

  if (longer.includes(shorter)) return 1

  let best = 0
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)))
    if (best === 1) break
  }
  return best
}

/**
 * `ratio` of the processed token lists after sorting, so word order is ignored.
 */
export function tokenSortRatio(a: string, b: string): number {
  const sortedA = tokenize(a).sort().join(' ')
  const sortedB = tokenize(b).sort().join(' ')
  return ratio(sortedA, sortedB)
}

/**
 * Compares the shared tokens against each side's full token set, so extra
 * words on one side cost little.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(tokenize(a))
  const tokensB = new Set(tokenize(b))
  if (tokensA.size === 0 || tokensB.size === 0) return 0

  const shared = [...tokensA].filter((token) => tokensB.has(token)).sort()
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort()
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort()

  const base = shared.join(' ')
  const withA = [base, onlyA.join(' ')].join(' ').trim()
  const withB = [base, onlyB.join(' ')].join(' ').trim()

  return Math.max(ratio(base, withA), ratio(base, withB), ratio(withA, withB))
}
