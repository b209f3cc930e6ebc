/**
 * Hard constraints applied before scoring: exact size and latte/non-latte.
 */

import type { CatalogEntry } from '../catalog/types'

export function isLatte(text: string): boolean {
  return text.toLowerCase().includes('latte')
}

/**
 * Keep catalog entries compatible with the label.
 * Without a size token every size stays a candidate. Catalog order is preserved.
 */
export function filterCandidates(
  sizeToken: string | undefined,
  labelIsLatte: boolean,
  catalog: readonly CatalogEntry[]
): CatalogEntry[] {
  return catalog.filter(entry => {
    if (sizeToken !== undefined && entry.ounce !== sizeToken) {
      return false
    }
    return isLatte(entry.productName) === labelIsLatte
  })
}
