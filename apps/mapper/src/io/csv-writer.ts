/**
 * CSV output for mapping results, catalogs and merged nutrition facts
 */

import * as fs from 'fs'
import * as path from 'path'
import { CATALOG_COLUMNS, NUTRITION_COLUMNS, type CatalogEntry } from '../catalog/types'
import { logger } from '../config/logger'
import { ERROR_CODES, MapperError } from '../errors'
import type { CatalogNutritionRow } from '../nutrition/merge'
import { toMappingRow } from '../resolver/output'
import { MAPPING_COLUMNS, type MatchResult } from '../resolver/types'

const log = logger.io

export type CsvValue = string | number | undefined

export function escapeCsv(value: CsvValue): string {
  if (value === undefined) return ''
  const stringValue = String(value)
  if (/[",\r\n]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`
  }
  return stringValue
}

/**
 * Header line plus one line per row; every line ends with "\n"
 */
export function formatCsv<C extends string>(
  columns: readonly C[],
  rows: readonly Readonly<Record<C, CsvValue>>[]
): string {
  const lines = [columns.map(escapeCsv).join(',')]
  for (const row of rows) {
    lines.push(columns.map(column => escapeCsv(row[column])).join(','))
  }
  return lines.join('\n') + '\n'
}

export function writeCsvFile(filePath: string, content: string, rows: number): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, content, 'utf8')
  } catch (error) {
    throw new MapperError(`Failed to write ${filePath}`, ERROR_CODES.WRITE_FAILED, { filePath }, { cause: error })
  }
  log.info('CSV written', { filePath, rows })
}

export function formatMappingCsv(results: readonly MatchResult[]): string {
  return formatCsv(MAPPING_COLUMNS, results.map(toMappingRow))
}

export function writeMappingCsv(filePath: string, results: readonly MatchResult[]): void {
  writeCsvFile(filePath, formatMappingCsv(results), results.length)
}

const CATALOG_OUTPUT_COLUMNS = [
  CATALOG_COLUMNS.productName,
  CATALOG_COLUMNS.category,
  CATALOG_COLUMNS.sizeName,
  CATALOG_COLUMNS.ounce,
  CATALOG_COLUMNS.temperatureL1,
  CATALOG_COLUMNS.temperatureL2,
] as const

export function catalogRow(entry: CatalogEntry): Record<(typeof CATALOG_OUTPUT_COLUMNS)[number], string> {
  return {
    [CATALOG_COLUMNS.productName]: entry.productName,
    [CATALOG_COLUMNS.category]: entry.category,
    [CATALOG_COLUMNS.sizeName]: entry.sizeName,
    [CATALOG_COLUMNS.ounce]: entry.ounce,
    [CATALOG_COLUMNS.temperatureL1]: entry.temperatureL1,
    [CATALOG_COLUMNS.temperatureL2]: entry.temperatureL2,
  }
}

export function formatCatalogCsv(catalog: readonly CatalogEntry[]): string {
  return formatCsv(CATALOG_OUTPUT_COLUMNS, catalog.map(catalogRow))
}

export function writeCatalogCsv(filePath: string, catalog: readonly CatalogEntry[]): void {
  writeCsvFile(filePath, formatCatalogCsv(catalog), catalog.length)
}

const FACTS_OUTPUT_COLUMNS = [
  ...CATALOG_OUTPUT_COLUMNS,
  NUTRITION_COLUMNS.calories,
  NUTRITION_COLUMNS.caffeine,
  NUTRITION_COLUMNS.sodium,
  NUTRITION_COLUMNS.protein,
  'Source Identifier',
] as const

export function formatFactsCsv(rows: readonly CatalogNutritionRow[]): string {
  return formatCsv(
    FACTS_OUTPUT_COLUMNS,
    rows.map(row => ({
      ...catalogRow(row.entry),
      [NUTRITION_COLUMNS.calories]: row.facts.calories,
      [NUTRITION_COLUMNS.caffeine]: row.facts.caffeine,
      [NUTRITION_COLUMNS.sodium]: row.facts.sodium,
      [NUTRITION_COLUMNS.protein]: row.facts.protein,
      'Source Identifier': row.sourceIdentifier,
    }))
  )
}

export function writeFactsCsv(filePath: string, rows: readonly CatalogNutritionRow[]): void {
  writeCsvFile(filePath, formatFactsCsv(rows), rows.length)
}
