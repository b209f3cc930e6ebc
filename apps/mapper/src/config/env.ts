/**
 * Mapper runtime configuration
 *
 * Read from the environment (the CLIs load .env through dotenv first).
 * Only the acceptance threshold, boost keywords and evidence size are tunable.
 */

import { z } from 'zod'
import { ConfigError } from '../errors'
import { DEFAULT_RESOLVER_CONFIG, type ResolverConfig } from '../resolver/types'

const keywordList = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(keyword => keyword.trim().toLowerCase())
      .filter(keyword => keyword.length > 0)
  )

const envSchema = z.object({
  MATCH_THRESHOLD: z.coerce.number().int().min(0).max(200).default(DEFAULT_RESOLVER_CONFIG.threshold),
  MATCH_BOOST_KEYWORDS: keywordList.optional(),
  MATCH_TOP_K: z.coerce.number().int().min(0).max(100).default(DEFAULT_RESOLVER_CONFIG.topKCandidates),
})

export type MapperConfig = ResolverConfig

/**
 * Treat blank variables as unset so `MATCH_THRESHOLD=` in a .env file falls back to the default
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value
    }
  }
  return result
}

export function loadMapperConfig(env: NodeJS.ProcessEnv = process.env): MapperConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env))

  if (!parsed.success) {
    throw new ConfigError('Invalid mapper configuration', {
      issues: parsed.error.issues.map(issue => ({
        variable: issue.path.join('.'),
        message: issue.message,
      })),
    })
  }

  return {
    threshold: parsed.data.MATCH_THRESHOLD,
    boostKeywords: parsed.data.MATCH_BOOST_KEYWORDS ?? DEFAULT_RESOLVER_CONFIG.boostKeywords,
    topKCandidates: parsed.data.MATCH_TOP_K,
  }
}
