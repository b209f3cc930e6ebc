/**
 * Catalog Combination Builder
 *
 * Expands the product, temperature and size option tables into the ordered list
 * of catalog entries the resolver matches against. Order is product, then
 * temperature, then size; the resolver's first-seen tie-break depends on it.
 */

import { mapSize, mapTemperature } from '../normalizer/dimensions'
import { normalizeName } from '../normalizer/name-normalizer'
import { logger } from '../config/logger'
import type { CatalogEntry, ProductOption, SizeOption, TemperatureOption } from './types'

const log = logger.catalog

/**
 * Category for products listed without one: "Tea Latte" when the name
 * contains "Latte" (case-sensitive), "Tea" otherwise
 */
export function deriveCategory(productName: string): string {
  return productName.includes('Latte') ? 'Tea Latte' : 'Tea'
}

export function buildCatalog(
  products: readonly ProductOption[],
  temperatures: readonly TemperatureOption[],
  sizes: readonly SizeOption[]
): CatalogEntry[] {
  const entries: CatalogEntry[] = []

  for (const product of products) {
    const category = product.category ?? deriveCategory(product.productName)
    for (const temperature of temperatures) {
      for (const size of sizes) {
        entries.push({
          productName: product.productName,
          category,
          sizeName: size.sizeName,
          ounce: size.ounce ?? mapSize(size.sizeName),
          temperatureL1: mapTemperature(temperature.temperatureL1),
          temperatureL2: temperature.temperatureL2,
        })
      }
    }
  }

  log.info('Catalog built', {
    products: products.length,
    temperatures: temperatures.length,
    sizes: sizes.length,
    entries: entries.length,
  })

  return entries
}

/**
 * Human-readable key for review reports, e.g. "16 oz jasmine green Hot Tea"
 */
export function catalogIdentifier(entry: CatalogEntry): string {
  return `${entry.ounce} ${normalizeName(entry.productName)} ${entry.temperatureL1} ${entry.category}`
}
