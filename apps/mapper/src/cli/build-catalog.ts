#!/usr/bin/env node
/**
 * CLI to build the catalog from the product, temperature and size option tables
 *
 * Usage:
 *   npm run build:catalog -w @brewmap/mapper -- --products data/products.csv \
 *     --temperatures data/temperatures.csv --sizes data/sizes.csv --out output/catalog.csv
 */

import 'dotenv/config'
import { logger } from '../config/logger'
import { runCatalogBuild } from '../pipeline/run-catalog-build'
import { errorMeta, requireArg } from './args'

const USAGE =
  'Usage: build-catalog --products <csv> --temperatures <csv> --sizes <csv> --out <csv>'

function main() {
  const argv = process.argv.slice(2)

  try {
    const { runId, entries } = runCatalogBuild({
      productsPath: requireArg(argv, '--products', USAGE),
      temperaturesPath: requireArg(argv, '--temperatures', USAGE),
      sizesPath: requireArg(argv, '--sizes', USAGE),
      outputPath: requireArg(argv, '--out', USAGE),
    })

    console.log(`✓ Catalog built (run ${runId}): ${entries} entries`)
    process.exit(0)
  } catch (error) {
    logger.cli.fatal('Catalog build failed', errorMeta(error), error)
    process.exit(1)
  }
}

main()
