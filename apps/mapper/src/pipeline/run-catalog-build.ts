/**
 * Catalog build pipeline: expand the option tables into the catalog CSV
 */

import { createId } from '@paralleldrive/cuid2'
import { withRunContext } from '@brewmap/logger'
import { buildCatalog } from '../catalog/builder'
import { logger } from '../config/logger'
import { writeCatalogCsv } from '../io/csv-writer'
import { loadProductOptions, loadSizeOptions, loadTemperatureOptions } from '../io/tables'

const log = logger.pipeline

export interface RunCatalogBuildOptions {
  productsPath: string
  temperaturesPath: string
  sizesPath: string
  outputPath: string
  runId?: string
}

export interface RunCatalogBuildResult {
  runId: string
  entries: number
}

export function runCatalogBuild(options: RunCatalogBuildOptions): RunCatalogBuildResult {
  const runId = options.runId ?? createId()

  return withRunContext({ runId }, () => {
    const products = loadProductOptions(options.productsPath)
    const temperatures = loadTemperatureOptions(options.temperaturesPath)
    const sizes = loadSizeOptions(options.sizesPath)

    const catalog = buildCatalog(products, temperatures, sizes)
    writeCatalogCsv(options.outputPath, catalog)

    log.info('CATALOG_BUILD_COMPLETE', { outputPath: options.outputPath, entries: catalog.length })
    return { runId, entries: catalog.length }
  })
}
