/**
 * Resolution output: mapping rows and run summary
 */

import { UNMAPPED, type MappingRow, type MatchResult } from './types'

/**
 * Flatten a result into the row handed to the writer.
 * Unmapped rows carry the literal "unmapped" in every column but identifier.
 */
export function toMappingRow(result: MatchResult): MappingRow {
  if (result.status === 'UNMAPPED') {
    return {
      identifier: result.identifier,
      product_name: UNMAPPED,
      ounce: UNMAPPED,
      size: UNMAPPED,
      category: UNMAPPED,
      temperature_l1: UNMAPPED,
    }
  }

  return {
    identifier: result.identifier,
    product_name: result.entry.productName,
    ounce: result.entry.ounce,
    size: result.entry.sizeName,
    category: result.entry.category,
    temperature_l1: result.entry.temperatureL1,
  }
}

export interface MappingSummary {
  total: number
  mapped: number
  unmapped: number
  /** mapped / total, 0 for an empty run */
  matchRate: number
  unmappedIdentifiers: string[]
}

export function summarizeResults(results: readonly MatchResult[]): MappingSummary {
  const unmappedIdentifiers = results
    .filter(result => result.status === 'UNMAPPED')
    .map(result => result.identifier)

  const total = results.length
  const mapped = total - unmappedIdentifiers.length

  return {
    total,
    mapped,
    unmapped: unmappedIdentifiers.length,
    matchRate: total === 0 ? 0 : mapped / total,
    unmappedIdentifiers,
  }
}
