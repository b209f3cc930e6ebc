/**
 * Catalog and nutrition dataset record types
 */

/**
 * One valid (product, size, temperature) combination offered for sale
 */
export interface CatalogEntry {
  readonly productName: string
  readonly category: string
  readonly sizeName: string
  readonly ounce: string
  readonly temperatureL1: string
  readonly temperatureL2: string
}

/**
 * One row of the independently maintained nutrition dataset.
 * Nutrition facts are undefined when the source cell is blank.
 */
export interface NutritionLabel {
  readonly identifier: string
  readonly calories?: number
  readonly caffeine?: number
  readonly sodium?: number
  readonly protein?: number
}

export type NutritionFacts = Pick<NutritionLabel, 'calories' | 'caffeine' | 'sodium' | 'protein'>

// Option tables the catalog is generated from

export interface ProductOption {
  readonly productName: string
  /** Derived from the product name when the product sheet has no category */
  readonly category?: string
}

export interface TemperatureOption {
  readonly temperatureL1: string
  readonly temperatureL2: string
}

export interface SizeOption {
  readonly sizeName: string
  /** Absent when the size sheet only carries the size name */
  readonly ounce?: string
}

/**
 * Column headers as they appear in the tabular sources
 */
export const CATALOG_COLUMNS = {
  productName: 'Product Name',
  category: 'Category',
  sizeName: 'Size',
  ounce: 'Ounce',
  temperatureL1: 'Temperature L1',
  temperatureL2: 'Temperature L2',
} as const satisfies Record<keyof CatalogEntry, string>

export const NUTRITION_COLUMNS = {
  identifier: 'Identifier',
  calories: 'Calories',
  caffeine: 'Caffeine (mg)',
  sodium: 'Sodium (mg)',
  protein: 'Protein (g)',
} as const satisfies Record<keyof NutritionLabel, string>

/** Older exports of the nutrition sheet name the identifier column differently */
export const IDENTIFIER_ALIASES = ['Beverage Type', 'Beverage'] as const
