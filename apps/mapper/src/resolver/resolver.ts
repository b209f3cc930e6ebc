/**
 * Label Resolver Core Algorithm
 *
 * Deterministically links each nutrition-dataset label to at most one catalog entry.
 *
 * Per label:
 * 1. Decompose the identifier into size token and name
 * 2. Normalize the name; detect latte from the raw identifier
 * 3. Filter the catalog by size and latte (hard constraints)
 * 4. Score every candidate; the first highest positive scorer wins ties
 * 5. MATCHED when a candidate exists and scores >= threshold, UNMAPPED otherwise
 *
 * Resolution is pure and synchronous: the catalog is never mutated and labels
 * do not influence each other.
 */

import { createHash } from 'crypto'
import type { CatalogEntry, NutritionLabel } from '../catalog/types'
import { logger } from '../config/logger'
import { UpstreamDataError, ERROR_CODES } from '../errors'
import { decomposeLabel } from '../normalizer/label-decomposer'
import { normalizeName } from '../normalizer/name-normalizer'
import { filterCandidates, isLatte } from './candidate-filter'
import { DEFAULT_SCORING_STRATEGY, createLevenshteinBoostedStrategy } from './scoring'
import {
  DEFAULT_RESOLVER_CONFIG,
  UNMAPPED_REASON,
  type MatchResult,
  type NormalizedLabel,
  type ResolutionEvidence,
  type ResolveOptions,
  type ResolverConfig,
  type ScoredCandidate,
  type ScoringStrategy,
  type UnmappedReason,
} from './types'

const log = logger.resolver

// Current resolver version - bump on algorithm changes
export const RESOLVER_VERSION = '1.1.0'

interface EffectiveConfig extends ResolverConfig {
  strategy: ScoringStrategy
}

function resolveConfig(options: ResolveOptions = {}): EffectiveConfig {
  const config: ResolverConfig = {
    threshold: options.threshold ?? DEFAULT_RESOLVER_CONFIG.threshold,
    boostKeywords: options.boostKeywords ?? DEFAULT_RESOLVER_CONFIG.boostKeywords,
    topKCandidates: options.topKCandidates ?? DEFAULT_RESOLVER_CONFIG.topKCandidates,
  }

  const strategy =
    options.scoringStrategy ??
    (options.boostKeywords ? createLevenshteinBoostedStrategy(options.boostKeywords) : DEFAULT_SCORING_STRATEGY)

  return { ...config, strategy }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logging Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolver-scoped logger; every entry carries the label identifier
 */
function createResolverLog(identifier: string) {
  return {
    debug: (event: string, meta?: Record<string, unknown>) =>
      log.debug(event, { identifier, ...meta }),
    info: (event: string, meta?: Record<string, unknown>) =>
      log.info(event, { identifier, ...meta }),
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry Points
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve one nutrition label against the catalog.
 * Never throws for unmatched input; UNMAPPED is a normal outcome.
 */
export function resolveLabel(
  label: NutritionLabel,
  catalog: readonly CatalogEntry[],
  options: ResolveOptions = {}
): MatchResult {
  return resolveWithConfig(label, catalog, resolveConfig(options))
}

/**
 * Resolve a batch of labels. Returns one result per label, in label order.
 *
 * Throws UpstreamDataError when either table is missing or empty.
 */
export function resolveLabels(
  labels: readonly NutritionLabel[] | null | undefined,
  catalog: readonly CatalogEntry[] | null | undefined,
  options: ResolveOptions = {}
): MatchResult[] {
  if (!catalog || catalog.length === 0) {
    throw new UpstreamDataError(
      'catalog',
      'Catalog table is missing or empty; refusing to resolve',
      catalog ? ERROR_CODES.EMPTY_TABLE : ERROR_CODES.UPSTREAM_UNAVAILABLE
    )
  }
  if (!labels || labels.length === 0) {
    throw new UpstreamDataError(
      'nutrition',
      'Nutrition label table is missing or empty; refusing to resolve',
      labels ? ERROR_CODES.EMPTY_TABLE : ERROR_CODES.UPSTREAM_UNAVAILABLE
    )
  }

  const config = resolveConfig(options)
  const startTime = Date.now()

  log.info('RESOLVER_START', {
    resolverVersion: RESOLVER_VERSION,
    scoringStrategy: config.strategy.name,
    labelCount: labels.length,
    catalogSize: catalog.length,
    config: {
      threshold: config.threshold,
      boostKeywords: config.boostKeywords,
      topKCandidates: config.topKCandidates,
    },
  })

  const results = labels.map(label => resolveWithConfig(label, catalog, config))

  const matched = results.filter(r => r.status === 'MATCHED').length
  log.info('RESOLVER_COMPLETE', {
    labelCount: results.length,
    matched,
    unmapped: results.length - matched,
    durationMs: Date.now() - startTime,
  })

  return results
}

// ═══════════════════════════════════════════════════════════════════════════════
// Algorithm
// ═══════════════════════════════════════════════════════════════════════════════

function resolveWithConfig(
  label: NutritionLabel,
  catalog: readonly CatalogEntry[],
  config: EffectiveConfig
): MatchResult {
  const rlog = createResolverLog(label.identifier)
  const rulesFired: string[] = []

  // STEP 1-2: decompose and normalize
  const { sizeToken, nameRemainder } = decomposeLabel(label.identifier)
  const input: NormalizedLabel = {
    identifier: label.identifier,
    sizeToken,
    nameRemainder,
    nameNorm: normalizeName(nameRemainder),
    isLatte: isLatte(label.identifier),
  }

  if (sizeToken === undefined) {
    // Label lacks the "<n> <unit>" prefix; every size stays a candidate
    rulesFired.push('SIZE_FILTER_SKIPPED')
  }
  if (input.isLatte) {
    rulesFired.push('LATTE_ONLY')
  }

  // STEP 3: hard constraints
  const candidates = filterCandidates(sizeToken, input.isLatte, catalog)

  rlog.debug('CANDIDATES_FILTERED', {
    sizeToken,
    nameNorm: input.nameNorm,
    isLatte: input.isLatte,
    catalogSize: catalog.length,
    candidateCount: candidates.length,
  })

  // STEP 4: score; strict ">" keeps the first-seen candidate on ties and a
  // candidate must score above 0 to be considered at all
  const scored: ScoredCandidate[] = []
  let best: { entry: CatalogEntry; candidate: ScoredCandidate } | undefined

  for (const [index, entry] of candidates.entries()) {
    const nameNorm = normalizeName(entry.productName)
    const breakdown = config.strategy.score(input.nameNorm, nameNorm)
    const candidate: ScoredCandidate = {
      index,
      productName: entry.productName,
      ounce: entry.ounce,
      temperatureL1: entry.temperatureL1,
      nameNorm,
      baseScore: breakdown.base,
      boostKeyword: breakdown.boostKeyword,
      score: breakdown.total,
    }
    scored.push(candidate)

    if (candidate.score > (best?.candidate.score ?? 0)) {
      best = { entry, candidate }
    }
  }

  const evidence: ResolutionEvidence = {
    resolverVersion: RESOLVER_VERSION,
    scoringStrategy: config.strategy.name,
    threshold: config.threshold,
    input,
    inputHash: computeInputHash(input, config),
    candidateCount: candidates.length,
    candidates: topCandidates(scored, config.topKCandidates),
    rulesFired,
  }

  // STEP 5: threshold
  if (candidates.length === 0) {
    rulesFired.push('NO_CANDIDATES')
    return createUnmappedResult(label.identifier, UNMAPPED_REASON.NO_CANDIDATES, evidence, rlog)
  }

  if (!best) {
    rulesFired.push('NO_POSITIVE_SCORE', 'BELOW_THRESHOLD')
    return createUnmappedResult(label.identifier, UNMAPPED_REASON.BELOW_THRESHOLD, evidence, rlog)
  }

  if (best.candidate.boostKeyword !== undefined) {
    rulesFired.push(`KEYWORD_BOOST:${best.candidate.boostKeyword}`)
  }

  if (best.candidate.score < config.threshold) {
    rulesFired.push('BELOW_THRESHOLD')
    return createUnmappedResult(label.identifier, UNMAPPED_REASON.BELOW_THRESHOLD, evidence, rlog)
  }

  rulesFired.push('MATCHED')
  rlog.debug('LABEL_MATCHED', {
    productName: best.entry.productName,
    ounce: best.entry.ounce,
    score: best.candidate.score,
    candidateCount: candidates.length,
  })

  return {
    status: 'MATCHED',
    identifier: label.identifier,
    entry: { ...best.entry },
    score: best.candidate.score,
    evidence,
  }
}

/**
 * Best-first copy; Array.prototype.sort is stable so ties keep catalog order
 */
function topCandidates(scored: readonly ScoredCandidate[], k: number): ScoredCandidate[] {
  return [...scored].sort((a, b) => b.score - a.score).slice(0, Math.max(0, k))
}

/**
 * Hash of the normalized input and everything that influences the decision.
 * Two runs with equal hashes against the same catalog make the same decision.
 */
function computeInputHash(input: NormalizedLabel, config: EffectiveConfig): string {
  const data = JSON.stringify({
    input,
    resolverVersion: RESOLVER_VERSION,
    scoringStrategy: config.strategy.name,
    threshold: config.threshold,
    boostKeywords: config.boostKeywords,
  })
  return createHash('sha256').update(data).digest('hex')
}

function createUnmappedResult(
  identifier: string,
  reasonCode: UnmappedReason,
  evidence: ResolutionEvidence,
  rlog: ReturnType<typeof createResolverLog>
): MatchResult {
  rlog.info('LABEL_UNMAPPED', {
    reasonCode,
    candidateCount: evidence.candidateCount,
    bestScore: evidence.candidates[0]?.score,
    threshold: evidence.threshold,
  })

  return {
    status: 'UNMAPPED',
    identifier,
    reasonCode,
    evidence,
  }
}
