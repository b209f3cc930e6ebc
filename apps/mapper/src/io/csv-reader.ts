/**
 * CSV table reader
 *
 * Reads a header-first CSV into records keyed by column name. Any failure to
 * produce a usable table is an UpstreamDataError.
 */

import * as fs from 'fs'
import { parse as parseCSV } from 'csv-parse/sync'
import { z } from 'zod'
import { logger } from '../config/logger'
import { ERROR_CODES, UpstreamDataError } from '../errors'

const log = logger.io

export interface CsvRecord {
  /** 1-indexed data row number (header excluded) */
  rowNumber: number
  values: Record<string, string>
}

export interface CsvTable {
  table: string
  header: string[]
  records: CsvRecord[]
}

export interface ColumnSpec {
  /** Columns that must be present */
  required: readonly string[]
  /** Alternative header names, mapped onto the canonical column */
  aliases?: Readonly<Record<string, readonly string[]>>
}

const rowsSchema = z.array(z.array(z.string()))

function parseRows(content: string, table: string): string[][] {
  let raw: unknown
  try {
    raw = parseCSV(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    })
  } catch (error) {
    throw new UpstreamDataError(
      table,
      `Failed to parse ${table} CSV: ${error instanceof Error ? error.message : String(error)}`,
      ERROR_CODES.PARSE_FAILED,
      undefined,
      { cause: error }
    )
  }
  return rowsSchema.parse(raw)
}

/**
 * Map alias headers onto canonical names; the first matching alias wins
 */
function canonicalHeader(header: string[], columns: ColumnSpec): string[] {
  const aliasToCanonical = new Map<string, string>()
  for (const [canonical, aliases] of Object.entries(columns.aliases ?? {})) {
    for (const alias of aliases) {
      aliasToCanonical.set(alias.toLowerCase(), canonical)
    }
  }

  const present = new Set(header)
  return header.map(column => {
    const canonical = aliasToCanonical.get(column.toLowerCase())
    return canonical !== undefined && !present.has(canonical) ? canonical : column
  })
}

export function parseCsvTable(content: string, table: string, columns: ColumnSpec): CsvTable {
  const rows = parseRows(content, table)
  const [rawHeader, ...dataRows] = rows

  if (!rawHeader) {
    throw new UpstreamDataError(table, `${table} CSV has no header row`, ERROR_CODES.EMPTY_TABLE)
  }

  const header = canonicalHeader(rawHeader, columns)
  const missing = columns.required.filter(column => !header.includes(column))
  if (missing.length > 0) {
    throw new UpstreamDataError(
      table,
      `${table} CSV is missing required column(s): ${missing.join(', ')}`,
      ERROR_CODES.MISSING_COLUMN,
      { missing, header }
    )
  }

  if (dataRows.length === 0) {
    throw new UpstreamDataError(table, `${table} CSV has no data rows`, ERROR_CODES.EMPTY_TABLE)
  }

  const records = dataRows.map((row, i) => {
    const values: Record<string, string> = {}
    header.forEach((column, columnIndex) => {
      values[column] = row[columnIndex] ?? ''
    })
    return { rowNumber: i + 1, values }
  })

  log.debug('CSV_PARSED', { table, columns: header.length, rows: records.length })

  return { table, header, records }
}

export function readCsvTable(filePath: string, table: string, columns: ColumnSpec): CsvTable {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf8')
  } catch (error) {
    throw new UpstreamDataError(
      table,
      `Cannot read ${table} table from ${filePath}`,
      ERROR_CODES.UPSTREAM_UNAVAILABLE,
      { filePath },
      { cause: error }
    )
  }

  const parsed = parseCsvTable(content, table, columns)
  log.info('Table loaded', { table, filePath, rows: parsed.records.length })
  return parsed
}
