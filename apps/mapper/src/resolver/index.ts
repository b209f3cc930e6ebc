/**
 * Label Resolver
 *
 * Links each nutrition-dataset label to exactly one outcome: a catalog entry with
 * its score, or an explicit UNMAPPED result.
 */

export { RESOLVER_VERSION, resolveLabel, resolveLabels } from './resolver'
export { filterCandidates, isLatte } from './candidate-filter'
export { toMappingRow, summarizeResults, type MappingSummary } from './output'
export {
  DEFAULT_RESOLVER_CONFIG,
  MAPPING_COLUMNS,
  UNMAPPED,
  UNMAPPED_REASON,
} from './types'
export type {
  MatchResult,
  MatchedResult,
  UnmappedResult,
  UnmappedReason,
  MappingRow,
  ResolutionEvidence,
  ResolveOptions,
  ResolverConfig,
  ScoredCandidate,
  NormalizedLabel,
} from './types'

// Scoring strategies
export {
  DEFAULT_SCORING_STRATEGY,
  LevenshteinBoostedStrategy,
  createLevenshteinBoostedStrategy,
  scoreNames,
  levenshteinRatio,
  indelDistance,
  longestCommonSubsequence,
  DEFAULT_BOOST_KEYWORDS,
  KEYWORD_BOOST,
  type ScoringStrategy,
  type ScoreBreakdown,
} from './scoring'
