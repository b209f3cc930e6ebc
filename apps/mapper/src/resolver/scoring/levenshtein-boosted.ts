/**
 * Default scoring strategy: Levenshtein ratio plus tea-type keyword boost.
 *
 * The boost is applied at most once and the total is not clamped, so a perfect
 * match on a boosted keyword scores 110.
 */

import type { ScoringStrategy, ScoreBreakdown } from '../types'
import { levenshteinRatio } from './text-similarity'
import { DEFAULT_BOOST_KEYWORDS, KEYWORD_BOOST, findSharedKeyword } from './keyword-boost'

export const SCORING_VERSION = 'levenshtein-boosted-2'

export function scoreNames(
  a: string,
  b: string,
  keywords: readonly string[] = DEFAULT_BOOST_KEYWORDS
): ScoreBreakdown {
  const base = levenshteinRatio(a, b)
  const boostKeyword = findSharedKeyword(a, b, keywords)

  return {
    base,
    boostKeyword,
    total: boostKeyword === undefined ? base : base + KEYWORD_BOOST,
  }
}

export function createLevenshteinBoostedStrategy(
  keywords: readonly string[] = DEFAULT_BOOST_KEYWORDS
): ScoringStrategy {
  return {
    name: SCORING_VERSION,
    score: (labelNorm, productNorm) => scoreNames(labelNorm, productNorm, keywords),
  }
}

export const LevenshteinBoostedStrategy = createLevenshteinBoostedStrategy()
