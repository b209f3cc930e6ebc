import { describe, it, expect } from 'vitest'
import { normalizeName } from '../name-normalizer'
import { decomposeLabel } from '../label-decomposer'
import { mapSize, mapTemperature } from '../dimensions'

describe('normalizeName', () => {
  it.each([
    ['Jasmine Green Tea Hot', 'jasmine green'],
    ['Jasmine Green Tea', 'jasmine green'],
    ['Milk Tea Latte Ice', 'milk'],
    ['Milk Tea Latte', 'milk'],
    ['Peach Oolong Tea Hot', 'peach oolong'],
    ['Bo Ya Black Tea', 'black'],
    ['Brewed Ceylon Hot Tea', 'ceylon'],
    ['(Extracted) Oolong', 'oolong'],
    ['Pure Tea Oolong', 'oolong'],
  ])('normalizes %j to %j', (raw, expected) => {
    expect(normalizeName(raw)).toBe(expected)
  })

  it('keeps internal spacing left by removed tokens', () => {
    expect(normalizeName('Green Tea Lemon')).toBe('green  lemon')
  })

  it('returns an empty string when nothing but qualifiers remain', () => {
    expect(normalizeName('Hot Tea')).toBe('')
    expect(normalizeName('')).toBe('')
  })

  it('is stable on already-normalized realistic names', () => {
    for (const raw of ['16 oz Jasmine Green Tea Hot', 'Peach Oolong Tea', 'Milk Tea Latte Ice']) {
      const once = normalizeName(raw)
      expect(normalizeName(once)).toBe(once)
    }
  })

  // Substring removal is not word-aware; these outputs are the current contract
  it('strips qualifiers inside longer words', () => {
    expect(normalizeName('Iced Peach')).toBe('d peach')
    expect(normalizeName('Lychee Juice')).toBe('lychee ju')
  })
})

describe('decomposeLabel', () => {
  it('splits the two-token size from the name', () => {
    expect(decomposeLabel('16 oz Jasmine Green Tea Hot')).toEqual({
      sizeToken: '16 oz',
      nameRemainder: 'Jasmine Green Tea Hot',
    })
  })

  it('returns no size for labels with fewer than three tokens', () => {
    expect(decomposeLabel('UnknownLabel')).toEqual({ nameRemainder: 'UnknownLabel' })
    expect(decomposeLabel('Green Tea')).toEqual({ nameRemainder: 'Green Tea' })
  })

  it('splits on single spaces', () => {
    expect(decomposeLabel('16  oz Tea')).toEqual({ sizeToken: '16 ', nameRemainder: 'oz Tea' })
  })

  it('does not interpret the size token', () => {
    expect(decomposeLabel('Large Cup Oolong')).toEqual({ sizeToken: 'Large Cup', nameRemainder: 'Oolong' })
  })
})

describe('dimension mapping', () => {
  it('maps catalog size names to ounces', () => {
    expect(mapSize('Small')).toBe('12 oz')
    expect(mapSize('Regular')).toBe('16 oz')
    expect(mapSize('Large')).toBe('22 oz')
  })

  it('passes unknown sizes and temperatures through', () => {
    expect(mapSize('Venti')).toBe('Venti')
    expect(mapSize('toString')).toBe('toString')
    expect(mapTemperature('Warm')).toBe('Warm')
  })

  it('keeps known temperatures', () => {
    expect(mapTemperature('Hot')).toBe('Hot')
    expect(mapTemperature('Ice')).toBe('Ice')
  })
})
