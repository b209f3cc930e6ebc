import { describe, it, expect } from 'vitest'
import { loadMapperConfig } from '../env'
import { ConfigError } from '../../errors'

describe('loadMapperConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadMapperConfig({})).toEqual({
      threshold: 75,
      boostKeywords: ['jasmine', 'peach', 'oolong', 'ceylon', 'black'],
      topKCandidates: 5,
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadMapperConfig({
      MATCH_THRESHOLD: '80',
      MATCH_BOOST_KEYWORDS: ' Jasmine, rose ,,',
      MATCH_TOP_K: '3',
    })

    expect(config).toEqual({ threshold: 80, boostKeywords: ['jasmine', 'rose'], topKCandidates: 3 })
  })

  it('treats blank variables as unset', () => {
    expect(loadMapperConfig({ MATCH_THRESHOLD: '  ' }).threshold).toBe(75)
  })

  it('rejects invalid values', () => {
    expect(() => loadMapperConfig({ MATCH_THRESHOLD: 'high' })).toThrow(ConfigError)
    expect(() => loadMapperConfig({ MATCH_THRESHOLD: '75.5' })).toThrow(ConfigError)
    expect(() => loadMapperConfig({ MATCH_TOP_K: '-1' })).toThrow(ConfigError)
  })

  it('names the offending variable', () => {
    try {
      loadMapperConfig({ MATCH_THRESHOLD: '500' })
      expect.unreachable('loadMapperConfig should throw')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.code).toBe('INVALID_CONFIG')
        expect(error.details).toEqual({
          issues: [{ variable: 'MATCH_THRESHOLD', message: expect.any(String) }],
        })
      }
    }
  })
})
