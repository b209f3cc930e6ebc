/**
 * Character-level string similarity
 */

/**
 * Longest common subsequence length.
 * Two-row dynamic programming; compares UTF-16 code units.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0

  let previous = new Array<number>(b.length + 1).fill(0)
  let current = new Array<number>(b.length + 1).fill(0)

  for (let i = 1; i <= a.length; i++) {
    current[0] = 0
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a.charCodeAt(i - 1) === b.charCodeAt(j - 1)
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1])
    }
    ;[previous, current] = [current, previous]
  }

  return previous[b.length]
}

/**
 * Edit distance with insertions and deletions only (a substitution costs 2)
 */
export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b)
}

/**
 * Round to the nearest integer, exact halves to the even neighbour
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Levenshtein similarity ratio on the 0-100 scale:
 * 100 × (|a| + |b| − indel distance) / (|a| + |b|), rounded.
 * Two empty strings score 100; an empty string against a non-empty one scores 0.
 */
export function levenshteinRatio(a: string, b: string): number {
  const total = a.length + b.length
  if (total === 0) return 100

  return roundHalfEven(100 * ((total - indelDistance(a, b)) / total))
}
