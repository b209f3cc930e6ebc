#!/usr/bin/env node
/**
 * CLI to map nutrition labels onto the beverage catalog
 *
 * Usage:
 *   npm run map -w @brewmap/mapper -- --catalog data/catalog.csv --nutrition data/nutrition.csv --out output/mapping.csv
 *   npm run map -w @brewmap/mapper -- ... --facts output/catalog-nutrition.csv --threshold 70
 */

import 'dotenv/config'
import { loadMapperConfig } from '../config/env'
import { logger } from '../config/logger'
import { runMapping } from '../pipeline/run-mapping'
import { errorMeta, getArg, parseThresholdArg, requireArg } from './args'

const USAGE =
  'Usage: map-nutrition --catalog <csv> --nutrition <csv> --out <csv> [--facts <csv>] [--threshold <n>]'

function main() {
  const argv = process.argv.slice(2)

  try {
    const config = loadMapperConfig()
    const threshold = parseThresholdArg(argv)

    const { runId, summary } = runMapping({
      catalogPath: requireArg(argv, '--catalog', USAGE),
      nutritionPath: requireArg(argv, '--nutrition', USAGE),
      outputPath: requireArg(argv, '--out', USAGE),
      factsOutputPath: getArg(argv, '--facts'),
      config: { ...config, threshold: threshold ?? config.threshold },
    })

    console.log(`✓ Mapping complete (run ${runId})`)
    console.log(`  Total:    ${summary.total}`)
    console.log(`  Mapped:   ${summary.mapped}`)
    console.log(`  Unmapped: ${summary.unmapped}`)
    process.exit(0)
  } catch (error) {
    logger.cli.fatal('Mapping failed', errorMeta(error), error)
    process.exit(1)
  }
}

main()
