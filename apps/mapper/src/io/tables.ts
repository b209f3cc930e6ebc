/**
 * Typed loaders for the catalog, nutrition and option tables
 */

import { z } from 'zod'
import {
  CATALOG_COLUMNS,
  IDENTIFIER_ALIASES,
  NUTRITION_COLUMNS,
  type CatalogEntry,
  type NutritionLabel,
  type ProductOption,
  type SizeOption,
  type TemperatureOption,
} from '../catalog/types'
import { logger } from '../config/logger'
import { ERROR_CODES, UpstreamDataError } from '../errors'
import { mapSize, mapTemperature } from '../normalizer/dimensions'
import { parseCsvTable, readCsvTable, type ColumnSpec, type CsvTable } from './csv-reader'

const log = logger.io

export interface RowIssue {
  table: string
  rowNumber: number
  column: string
  message: string
}

export interface LoadedTable<T> {
  rows: T[]
  issues: RowIssue[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Column specs
// ═══════════════════════════════════════════════════════════════════════════════

export const CATALOG_SPEC: ColumnSpec = {
  required: [
    CATALOG_COLUMNS.productName,
    CATALOG_COLUMNS.category,
    CATALOG_COLUMNS.sizeName,
    CATALOG_COLUMNS.temperatureL1,
  ],
  aliases: { [CATALOG_COLUMNS.sizeName]: ['Size Name'] },
}

export const NUTRITION_SPEC: ColumnSpec = {
  required: [NUTRITION_COLUMNS.identifier],
  aliases: { [NUTRITION_COLUMNS.identifier]: IDENTIFIER_ALIASES },
}

export const PRODUCT_OPTIONS_SPEC: ColumnSpec = {
  required: ['Product Name'],
  aliases: { 'Product Name': ['Product name', 'Product'] },
}
export const TEMPERATURE_OPTIONS_SPEC: ColumnSpec = { required: ['Temperature L1'] }
export const SIZE_OPTIONS_SPEC: ColumnSpec = {
  required: ['Size Name'],
  aliases: { 'Size Name': ['Size'] },
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cell parsing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Nutrition fact cell: blank is "not reported", thousands separators allowed
 */
const numericCell = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === '') return undefined
    const parsed = Number(value.replaceAll(',', ''))
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: "${value}"` })
      return z.NEVER
    }
    return parsed
  })

function requireNonEmpty(table: CsvTable, column: string): void {
  const blank = table.records.filter(record => record.values[column] === '')
  if (blank.length > 0) {
    throw new UpstreamDataError(
      table.table,
      `${table.table} has ${blank.length} row(s) with a blank "${column}"`,
      ERROR_CODES.MISSING_COLUMN,
      { column, rowNumbers: blank.slice(0, 10).map(record => record.rowNumber) }
    )
  }
}

function cell(values: Record<string, string>, column: string): string {
  return values[column] ?? ''
}

function optionalCell(values: Record<string, string>, column: string): string | undefined {
  const value = values[column]
  return value === undefined || value === '' ? undefined : value
}

// ═══════════════════════════════════════════════════════════════════════════════
// Catalog
// ═══════════════════════════════════════════════════════════════════════════════

export function catalogFromTable(table: CsvTable): CatalogEntry[] {
  requireNonEmpty(table, CATALOG_COLUMNS.productName)

  return table.records.map(({ values }) => {
    const sizeName = cell(values, CATALOG_COLUMNS.sizeName)
    return {
      productName: cell(values, CATALOG_COLUMNS.productName),
      category: cell(values, CATALOG_COLUMNS.category),
      sizeName,
      ounce: optionalCell(values, CATALOG_COLUMNS.ounce) ?? mapSize(sizeName),
      temperatureL1: mapTemperature(cell(values, CATALOG_COLUMNS.temperatureL1)),
      temperatureL2: cell(values, CATALOG_COLUMNS.temperatureL2),
    }
  })
}

export function parseCatalogCsv(content: string): CatalogEntry[] {
  return catalogFromTable(parseCsvTable(content, 'catalog', CATALOG_SPEC))
}

export function loadCatalogCsv(filePath: string): CatalogEntry[] {
  return catalogFromTable(readCsvTable(filePath, 'catalog', CATALOG_SPEC))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Nutrition labels
// ═══════════════════════════════════════════════════════════════════════════════

const FACT_COLUMNS = {
  calories: NUTRITION_COLUMNS.calories,
  caffeine: NUTRITION_COLUMNS.caffeine,
  sodium: NUTRITION_COLUMNS.sodium,
  protein: NUTRITION_COLUMNS.protein,
} as const

export function labelsFromTable(table: CsvTable): LoadedTable<NutritionLabel> {
  requireNonEmpty(table, NUTRITION_COLUMNS.identifier)

  const issues: RowIssue[] = []

  const rows = table.records.map(({ rowNumber, values }) => {
    const facts: Partial<Record<keyof typeof FACT_COLUMNS, number>> = {}

    for (const [field, column] of Object.entries(FACT_COLUMNS)) {
      const raw = values[column]
      if (raw === undefined) continue

      const parsed = numericCell.safeParse(raw)
      if (!parsed.success) {
        issues.push({
          table: table.table,
          rowNumber,
          column,
          message: parsed.error.issues[0]?.message ?? 'Invalid value',
        })
        continue
      }
      if (parsed.data !== undefined && isFactField(field)) {
        facts[field] = parsed.data
      }
    }

    const label: NutritionLabel = {
      identifier: cell(values, NUTRITION_COLUMNS.identifier),
      ...facts,
    }
    return label
  })

  for (const issue of issues) {
    log.warn('NUTRITION_CELL_INVALID', { ...issue })
  }

  return { rows, issues }
}

function isFactField(field: string): field is keyof typeof FACT_COLUMNS {
  return Object.hasOwn(FACT_COLUMNS, field)
}

export function parseNutritionCsv(content: string): LoadedTable<NutritionLabel> {
  return labelsFromTable(parseCsvTable(content, 'nutrition', NUTRITION_SPEC))
}

export function loadNutritionCsv(filePath: string): LoadedTable<NutritionLabel> {
  return labelsFromTable(readCsvTable(filePath, 'nutrition', NUTRITION_SPEC))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Option tables (catalog generation inputs)
// ═══════════════════════════════════════════════════════════════════════════════

export function loadProductOptions(filePath: string): ProductOption[] {
  const table = readCsvTable(filePath, 'products', PRODUCT_OPTIONS_SPEC)
  requireNonEmpty(table, 'Product Name')
  return table.records.map(({ values }) => ({
    productName: cell(values, 'Product Name'),
    category: optionalCell(values, 'Category'),
  }))
}

export function loadTemperatureOptions(filePath: string): TemperatureOption[] {
  const table = readCsvTable(filePath, 'temperatures', TEMPERATURE_OPTIONS_SPEC)
  requireNonEmpty(table, 'Temperature L1')
  return table.records.map(({ values }) => ({
    temperatureL1: cell(values, 'Temperature L1'),
    temperatureL2: cell(values, 'Temperature L2'),
  }))
}

export function loadSizeOptions(filePath: string): SizeOption[] {
  const table = readCsvTable(filePath, 'sizes', SIZE_OPTIONS_SPEC)
  requireNonEmpty(table, 'Size Name')
  return table.records.map(({ values }) => ({
    sizeName: cell(values, 'Size Name'),
    ounce: optionalCell(values, 'Ounce'),
  }))
}
