/**
 * @brewmap/mapper
 *
 * Links nutrition-dataset labels to beverage catalog entries.
 */

export * from './resolver'
export * from './normalizer'
export { buildCatalog, catalogIdentifier } from './catalog/builder'
export {
  CATALOG_COLUMNS,
  NUTRITION_COLUMNS,
  IDENTIFIER_ALIASES,
  type CatalogEntry,
  type NutritionLabel,
  type NutritionFacts,
  type ProductOption,
  type TemperatureOption,
  type SizeOption,
} from './catalog/types'
export { loadMapperConfig, type MapperConfig } from './config/env'
export { ERROR_CODES, MapperError, UpstreamDataError, ConfigError, isMapperError, type ErrorCode } from './errors'
export { parseCsvTable, readCsvTable, type CsvTable, type CsvRecord, type ColumnSpec } from './io/csv-reader'
export {
  loadCatalogCsv,
  loadNutritionCsv,
  loadProductOptions,
  loadSizeOptions,
  loadTemperatureOptions,
  parseCatalogCsv,
  parseNutritionCsv,
  type LoadedTable,
  type RowIssue,
} from './io/tables'
export {
  escapeCsv,
  formatCsv,
  formatMappingCsv,
  formatCatalogCsv,
  formatFactsCsv,
  writeMappingCsv,
  writeCatalogCsv,
  writeFactsCsv,
} from './io/csv-writer'
export { mergeNutritionFacts, mergeKey, type CatalogNutritionRow, type MergeResult } from './nutrition/merge'
export * from './pipeline'
