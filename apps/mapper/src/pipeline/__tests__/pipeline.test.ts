/**
 * End-to-end pipeline tests against CSV files in a temp directory
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

vi.mock('../../config/logger', () => {
  const component = () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
  })
  return {
    logger: {
      resolver: component(),
      io: component(),
      catalog: component(),
      nutrition: component(),
      pipeline: component(),
      config: component(),
      cli: component(),
    },
  }
})

import { getRunContext } from '@brewmap/logger'
import { logger } from '../../config/logger'
import { ERROR_CODES, UpstreamDataError } from '../../errors'
import { runCatalogBuild } from '../run-catalog-build'
import { runMapping } from '../run-mapping'

const CATALOG_CSV = [
  'Product Name,Category,Size,Ounce,Temperature L1,Temperature L2',
  'Jasmine Green Tea,Tea,Regular,16 oz,Hot,',
  'Oolong Tea,Tea,Regular,16 oz,Hot,',
].join('\n')

const NUTRITION_CSV = [
  'Identifier,Calories,Caffeine (mg),Sodium (mg),Protein (g)',
  '16 oz Jasmine Green Tea Hot,0,25,,0',
  '22 oz Oolong Tea Hot,5,40,,0',
].join('\n')

describe('pipelines', () => {
  let dir: string

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name)
    fs.writeFileSync(filePath, content)
    return filePath
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mapper-pipeline-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  describe('runMapping', () => {
    it('writes the mapping table and returns the summary', () => {
      const outputPath = path.join(dir, 'out', 'mapping.csv')

      const result = runMapping({
        catalogPath: write('catalog.csv', CATALOG_CSV),
        nutritionPath: write('nutrition.csv', NUTRITION_CSV),
        outputPath,
        runId: 'run-1',
      })

      expect(result).toEqual({
        runId: 'run-1',
        summary: {
          total: 2,
          mapped: 1,
          unmapped: 1,
          matchRate: 0.5,
          unmappedIdentifiers: ['22 oz Oolong Tea Hot'],
        },
        rowIssues: 0,
        factConflicts: 0,
      })
      expect(fs.readFileSync(outputPath, 'utf8')).toBe(
        [
          'identifier,product_name,ounce,size,category,temperature_l1',
          '16 oz Jasmine Green Tea Hot,Jasmine Green Tea,16 oz,Regular,Tea,Hot',
          '22 oz Oolong Tea Hot,unmapped,unmapped,unmapped,unmapped,unmapped',
          '',
        ].join('\n')
      )
    })

    it('writes merged nutrition facts when asked', () => {
      const factsOutputPath = path.join(dir, 'facts.csv')

      runMapping({
        catalogPath: write('catalog.csv', CATALOG_CSV),
        nutritionPath: write('nutrition.csv', NUTRITION_CSV),
        outputPath: path.join(dir, 'mapping.csv'),
        factsOutputPath,
        runId: 'run-2',
      })

      expect(fs.readFileSync(factsOutputPath, 'utf8')).toBe(
        [
          'Product Name,Category,Size,Ounce,Temperature L1,Temperature L2,Calories,Caffeine (mg),Sodium (mg),Protein (g),Source Identifier',
          'Jasmine Green Tea,Tea,Regular,16 oz,Hot,,0,25,,0,16 oz Jasmine Green Tea Hot',
          'Oolong Tea,Tea,Regular,16 oz,Hot,,,,,,',
          '',
        ].join('\n')
      )
    })

    it('applies the configured threshold', () => {
      const result = runMapping({
        catalogPath: write('catalog.csv', CATALOG_CSV),
        nutritionPath: write('nutrition.csv', NUTRITION_CSV),
        outputPath: path.join(dir, 'mapping.csv'),
        config: { threshold: 111 },
      })

      expect(result.summary.mapped).toBe(0)
    })

    it('logs the run summary inside the run context', () => {
      let runIdAtLog: unknown
      vi.mocked(logger.pipeline.info).mockImplementation(() => {
        runIdAtLog = getRunContext()?.runId
      })

      runMapping({
        catalogPath: write('catalog.csv', CATALOG_CSV),
        nutritionPath: write('nutrition.csv', NUTRITION_CSV),
        outputPath: path.join(dir, 'mapping.csv'),
        runId: 'run-ctx',
      })

      expect(runIdAtLog).toBe('run-ctx')
      expect(logger.pipeline.info).toHaveBeenCalledWith(
        'MAPPING_RUN_COMPLETE',
        expect.objectContaining({ total: 2, mapped: 1, unmapped: 1, matchRatePct: 50 })
      )
      vi.mocked(logger.pipeline.info).mockReset()
    })

    it('generates a run id when none is given', () => {
      const result = runMapping({
        catalogPath: write('catalog.csv', CATALOG_CSV),
        nutritionPath: write('nutrition.csv', NUTRITION_CSV),
        outputPath: path.join(dir, 'mapping.csv'),
      })

      expect(result.runId).toMatch(/^[a-z0-9]{24}$/)
    })

    it('stops without writing when the nutrition table is unavailable', () => {
      const outputPath = path.join(dir, 'mapping.csv')

      expect(() =>
        runMapping({
          catalogPath: write('catalog.csv', CATALOG_CSV),
          nutritionPath: path.join(dir, 'missing.csv'),
          outputPath,
        })
      ).toThrow(UpstreamDataError)
      expect(fs.existsSync(outputPath)).toBe(false)
    })

    it('stops when the catalog has no rows', () => {
      try {
        runMapping({
          catalogPath: write('catalog.csv', 'Product Name,Category,Size,Temperature L1\n'),
          nutritionPath: write('nutrition.csv', NUTRITION_CSV),
          outputPath: path.join(dir, 'mapping.csv'),
        })
        expect.unreachable('runMapping should throw')
      } catch (error) {
        expect(error).toBeInstanceOf(UpstreamDataError)
        if (error instanceof UpstreamDataError) {
          expect(error.table).toBe('catalog')
          expect(error.code).toBe(ERROR_CODES.EMPTY_TABLE)
        }
      }
    })
  })

  describe('runCatalogBuild', () => {
    it('expands the option tables into the catalog file', () => {
      const outputPath = path.join(dir, 'catalog.csv')

      const result = runCatalogBuild({
        productsPath: write('products.csv', 'Product Name,Category\nJasmine Green Tea,Tea\n'),
        temperaturesPath: write('temperatures.csv', 'Temperature L1,Temperature L2\nHot,\nIce,Less Ice\n'),
        sizesPath: write('sizes.csv', 'Size Name\nSmall\nLarge\n'),
        outputPath,
        runId: 'build-1',
      })

      expect(result).toEqual({ runId: 'build-1', entries: 4 })
      expect(fs.readFileSync(outputPath, 'utf8')).toBe(
        [
          'Product Name,Category,Size,Ounce,Temperature L1,Temperature L2',
          'Jasmine Green Tea,Tea,Small,12 oz,Hot,',
          'Jasmine Green Tea,Tea,Large,22 oz,Hot,',
          'Jasmine Green Tea,Tea,Small,12 oz,Ice,Less Ice',
          'Jasmine Green Tea,Tea,Large,22 oz,Ice,Less Ice',
          '',
        ].join('\n')
      )
    })

    it('derives categories when the product list has none', () => {
      const outputPath = path.join(dir, 'catalog.csv')

      runCatalogBuild({
        productsPath: write('products.csv', 'Product name\nMilk Tea Latte\nOolong Tea\n'),
        temperaturesPath: write('temperatures.csv', 'Temperature L1\nHot\n'),
        sizesPath: write('sizes.csv', 'Size Name\nSmall\n'),
        outputPath,
        runId: 'build-2',
      })

      expect(fs.readFileSync(outputPath, 'utf8')).toBe(
        [
          'Product Name,Category,Size,Ounce,Temperature L1,Temperature L2',
          'Milk Tea Latte,Tea Latte,Small,12 oz,Hot,',
          'Oolong Tea,Tea,Small,12 oz,Hot,',
          '',
        ].join('\n')
      )
    })
  })
})
