/**
 * Catalog dimension vocabularies
 *
 * Translate the catalog's size and temperature names into the vocabulary the
 * nutrition dataset uses. Both vocabularies are closed; anything not listed
 * passes through unchanged.
 */

export const SIZE_OUNCES: Readonly<Record<string, string>> = Object.freeze({
  Small: '12 oz',
  Regular: '16 oz',
  Large: '22 oz',
})

export const TEMPERATURE_NAMES: Readonly<Record<string, string>> = Object.freeze({
  Hot: 'Hot',
  Ice: 'Ice',
  Regular: 'Regular',
  Less: 'Less',
})

function lookup(table: Readonly<Record<string, string>>, key: string): string {
  return Object.hasOwn(table, key) ? table[key] : key
}

export function mapSize(size: string): string {
  return lookup(SIZE_OUNCES, size)
}

export function mapTemperature(temperature: string): string {
  return lookup(TEMPERATURE_NAMES, temperature)
}
