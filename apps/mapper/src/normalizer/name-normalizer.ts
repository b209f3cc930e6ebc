/**
 * Beverage Name Normalization
 *
 * Folds a free-text beverage label into the canonical form used for similarity
 * comparison. Each step runs on the output of the previous one, so the order of
 * the token lists is significant.
 *
 * Removal is plain substring replacement, not word-boundary aware: "ice" is
 * also stripped out of "juice" and "rice".
 */

// Preparation and temperature qualifiers, removed in this order
const QUALIFIER_TOKENS = ['extracted', 'brewed', 'hot tea', 'iced tea', 'hot', 'ice'] as const

const BRAND_NOISE_TOKENS = ['bo ya'] as const

function removeAll(value: string, token: string): string {
  return value.replaceAll(token, '')
}

export function normalizeName(raw: string): string {
  let name = raw.toLowerCase()

  // Parenthesis delimiters only; their content stays
  name = name.replaceAll('(', '').replaceAll(')', '')

  for (const token of QUALIFIER_TOKENS) {
    name = removeAll(name, token)
  }

  // "Milk Tea Latte" and "Milk Tea" differ only in the latte marker
  name = name.replaceAll('tea latte', 'tea')
  name = removeAll(name, 'latte')

  name = removeAll(name, 'pure tea')
  name = removeAll(name, 'tea')

  for (const token of BRAND_NOISE_TOKENS) {
    name = removeAll(name, token)
  }

  // Internal runs of spaces left by removed tokens are not collapsed
  return name.trim()
}
