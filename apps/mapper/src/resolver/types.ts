/**
 * Label Resolver Types
 *
 * Type definitions for the resolver algorithm and its evidence.
 */

import type { CatalogEntry } from '../catalog/types'
import { DEFAULT_BOOST_KEYWORDS } from './scoring/keyword-boost'

/**
 * Score of one label/product comparison
 */
export interface ScoreBreakdown {
  /** Character similarity on the 0-100 scale */
  base: number
  /** Keyword both names share, when the boost was applied */
  boostKeyword?: string
  /** base plus boost; may exceed 100 */
  total: number
}

/**
 * Pluggable scoring strategy.
 * Receives already-normalized names.
 */
export interface ScoringStrategy {
  name: string
  score(labelNorm: string, productNorm: string): ScoreBreakdown
}

/**
 * Scored candidate recorded in evidence
 */
export interface ScoredCandidate {
  /** Position of the entry in the candidate sequence */
  index: number
  productName: string
  ounce: string
  temperatureL1: string
  nameNorm: string
  baseScore: number
  boostKeyword?: string
  score: number
}

/**
 * Normalized view of the label the decision was made on
 */
export interface NormalizedLabel {
  identifier: string
  sizeToken?: string
  nameRemainder: string
  nameNorm: string
  isLatte: boolean
}

/**
 * Everything needed to explain a decision after the fact
 */
export interface ResolutionEvidence {
  resolverVersion: string
  scoringStrategy: string
  threshold: number
  input: NormalizedLabel
  inputHash: string
  candidateCount: number
  /** Top candidates by score, best first; ties keep catalog order */
  candidates: ScoredCandidate[]
  rulesFired: string[]
}

export const UNMAPPED_REASON = {
  /** Size and latte constraints left nothing to score */
  NO_CANDIDATES: 'NO_CANDIDATES',
  /** Best candidate scored below the acceptance threshold */
  BELOW_THRESHOLD: 'BELOW_THRESHOLD',
} as const

export type UnmappedReason = (typeof UNMAPPED_REASON)[keyof typeof UNMAPPED_REASON]

export interface MatchedResult {
  status: 'MATCHED'
  identifier: string
  entry: CatalogEntry
  score: number
  evidence: ResolutionEvidence
}

export interface UnmappedResult {
  status: 'UNMAPPED'
  identifier: string
  reasonCode: UnmappedReason
  evidence: ResolutionEvidence
}

/**
 * Exactly one per nutrition label
 */
export type MatchResult = MatchedResult | UnmappedResult

/**
 * Resolver configuration (runtime)
 */
export interface ResolverConfig {
  /** Minimum total score for a match (inclusive) */
  threshold: number
  /** Keywords that earn the shared-keyword boost */
  boostKeywords: readonly string[]
  /** Number of scored candidates kept in evidence */
  topKCandidates: number
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  threshold: 75,
  boostKeywords: DEFAULT_BOOST_KEYWORDS,
  topKCandidates: 5,
}

export interface ResolveOptions extends Partial<ResolverConfig> {
  /** Overrides the strategy built from boostKeywords */
  scoringStrategy?: ScoringStrategy
}

/**
 * Output table row handed to the CSV / sheet writer
 */
export interface MappingRow {
  identifier: string
  product_name: string
  ounce: string
  size: string
  category: string
  temperature_l1: string
}

export const MAPPING_COLUMNS = [
  'identifier',
  'product_name',
  'ounce',
  'size',
  'category',
  'temperature_l1',
] as const satisfies readonly (keyof MappingRow)[]

export const UNMAPPED = 'unmapped'
