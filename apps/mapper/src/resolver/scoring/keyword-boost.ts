/**
 * Tea-type keyword boost
 *
 * A single discriminating word ("peach" vs "oolong") is under-weighted by the
 * character ratio when the surrounding text is similar. Candidates sharing one
 * of these keywords with the label get a fixed bonus.
 */

export const DEFAULT_BOOST_KEYWORDS: readonly string[] = Object.freeze([
  'jasmine',
  'peach',
  'oolong',
  'ceylon',
  'black',
])

export const KEYWORD_BOOST = 10

/**
 * First keyword (in keyword order) contained in both strings, if any
 */
export function findSharedKeyword(
  a: string,
  b: string,
  keywords: readonly string[] = DEFAULT_BOOST_KEYWORDS
): string | undefined {
  return keywords.find(keyword => a.includes(keyword) && b.includes(keyword))
}
