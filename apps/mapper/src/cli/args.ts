/**
 * Minimal "--flag value" argument helpers shared by the CLIs
 */

import { ConfigError, isMapperError } from '../errors'

export function getArg(argv: readonly string[], flag: string): string | undefined {
  const index = argv.indexOf(flag)
  if (index === -1) return undefined
  return argv[index + 1]
}

export function requireArg(argv: readonly string[], flag: string, usage: string): string {
  const value = getArg(argv, flag)
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`Missing required argument ${flag}\n${usage}`, { flag })
  }
  return value
}

export function parseThresholdArg(argv: readonly string[]): number | undefined {
  const raw = getArg(argv, '--threshold')
  if (raw === undefined) return undefined

  const threshold = Number(raw)
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > 200) {
    throw new ConfigError(`--threshold must be an integer between 0 and 200, got "${raw}"`, { threshold: raw })
  }
  return threshold
}

/**
 * Log fields for a fatal error; mapper errors contribute their code and details
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  return isMapperError(error) ? { code: error.code, ...error.details } : {}
}
