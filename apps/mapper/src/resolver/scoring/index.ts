/**
 * Scoring Strategy Registry
 */

export {
  LevenshteinBoostedStrategy,
  createLevenshteinBoostedStrategy,
  scoreNames,
  SCORING_VERSION,
} from './levenshtein-boosted'
export { indelDistance, levenshteinRatio, longestCommonSubsequence } from './text-similarity'
export { DEFAULT_BOOST_KEYWORDS, KEYWORD_BOOST, findSharedKeyword } from './keyword-boost'

export type { ScoringStrategy, ScoreBreakdown } from '../types'

import { LevenshteinBoostedStrategy } from './levenshtein-boosted'

/**
 * Default scoring strategy used by the resolver
 */
export const DEFAULT_SCORING_STRATEGY = LevenshteinBoostedStrategy
