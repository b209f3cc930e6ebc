/**
 * Mapping pipeline: load tables, resolve every label, write the mapping table
 */

import { createId } from '@paralleldrive/cuid2'
import { withRunContext } from '@brewmap/logger'
import { logger } from '../config/logger'
import { writeFactsCsv, writeMappingCsv } from '../io/csv-writer'
import { loadCatalogCsv, loadNutritionCsv } from '../io/tables'
import { mergeNutritionFacts } from '../nutrition/merge'
import { summarizeResults, type MappingSummary } from '../resolver/output'
import { resolveLabels } from '../resolver/resolver'
import type { ResolveOptions } from '../resolver/types'

const log = logger.pipeline

export interface RunMappingOptions {
  catalogPath: string
  nutritionPath: string
  outputPath: string
  /** When set, also write the catalog with merged nutrition facts */
  factsOutputPath?: string
  config?: ResolveOptions
  /** Defaults to a fresh cuid */
  runId?: string
}

export interface RunMappingResult {
  runId: string
  summary: MappingSummary
  /** Nutrition cells that failed to parse */
  rowIssues: number
  /** Labels whose facts lost to an earlier label for the same catalog row */
  factConflicts: number
}

export function runMapping(options: RunMappingOptions): RunMappingResult {
  const runId = options.runId ?? createId()

  return withRunContext({ runId }, () => {
    const startTime = Date.now()
    log.info('MAPPING_RUN_START', {
      catalogPath: options.catalogPath,
      nutritionPath: options.nutritionPath,
      outputPath: options.outputPath,
    })

    const catalog = loadCatalogCsv(options.catalogPath)
    const nutrition = loadNutritionCsv(options.nutritionPath)

    const results = resolveLabels(nutrition.rows, catalog, options.config)
    writeMappingCsv(options.outputPath, results)

    let factConflicts = 0
    if (options.factsOutputPath) {
      const merged = mergeNutritionFacts(catalog, results, nutrition.rows)
      writeFactsCsv(options.factsOutputPath, merged.rows)
      factConflicts = merged.conflicts.length
    }

    const summary = summarizeResults(results)
    log.info('MAPPING_RUN_COMPLETE', {
      total: summary.total,
      mapped: summary.mapped,
      unmapped: summary.unmapped,
      matchRatePct: Math.round(summary.matchRate * 1000) / 10,
      rowIssues: nutrition.issues.length,
      factConflicts,
      durationMs: Date.now() - startTime,
    })

    return { runId, summary, rowIssues: nutrition.issues.length, factConflicts }
  })
}
