/**
 * Nutrition fact merge
 *
 * Attaches the facts of each matched label to the catalog row it resolved to.
 * Rows are keyed by product name, ounce and temperature L1; several catalog rows
 * (e.g. different Temperature L2 variants) can share a key and all receive the facts.
 */

import type { CatalogEntry, NutritionFacts, NutritionLabel } from '../catalog/types'
import { logger } from '../config/logger'
import type { MatchResult } from '../resolver/types'

const log = logger.nutrition

export interface CatalogNutritionRow {
  entry: CatalogEntry
  /** Identifier of the label the facts came from */
  sourceIdentifier?: string
  facts: NutritionFacts
}

export interface MergeResult {
  rows: CatalogNutritionRow[]
  /** Labels whose facts were dropped because an earlier label claimed the row */
  conflicts: Array<{ key: string; kept: string; dropped: string }>
}

export function mergeKey(entry: Pick<CatalogEntry, 'productName' | 'ounce' | 'temperatureL1'>): string {
  return `${entry.productName}|${entry.ounce}|${entry.temperatureL1}`
}

function factsOf(label: NutritionLabel): NutritionFacts {
  return {
    calories: label.calories,
    caffeine: label.caffeine,
    sodium: label.sodium,
    protein: label.protein,
  }
}

export function mergeNutritionFacts(
  catalog: readonly CatalogEntry[],
  results: readonly MatchResult[],
  labels: readonly NutritionLabel[]
): MergeResult {
  const labelsById = new Map<string, NutritionLabel>()
  for (const label of labels) {
    if (!labelsById.has(label.identifier)) {
      labelsById.set(label.identifier, label)
    }
  }

  const claimed = new Map<string, { identifier: string; facts: NutritionFacts }>()
  const conflicts: MergeResult['conflicts'] = []

  for (const result of results) {
    if (result.status !== 'MATCHED') continue

    const label = labelsById.get(result.identifier)
    if (!label) continue

    const key = mergeKey(result.entry)
    const existing = claimed.get(key)
    if (existing) {
      conflicts.push({ key, kept: existing.identifier, dropped: result.identifier })
      log.warn('NUTRITION_CONFLICT', { key, kept: existing.identifier, dropped: result.identifier })
      continue
    }

    claimed.set(key, { identifier: result.identifier, facts: factsOf(label) })
  }

  const rows: CatalogNutritionRow[] = catalog.map(entry => {
    const claim = claimed.get(mergeKey(entry))
    return claim
      ? { entry, sourceIdentifier: claim.identifier, facts: claim.facts }
      : { entry, facts: {} }
  })

  log.info('Nutrition facts merged', {
    catalogRows: catalog.length,
    rowsWithFacts: rows.filter(row => row.sourceIdentifier !== undefined).length,
    conflicts: conflicts.length,
  })

  return { rows, conflicts }
}
