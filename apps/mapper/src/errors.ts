/**
 * Mapper error types
 *
 * Only conditions that must abort a run are modeled as errors.
 * A label that cannot be matched is a normal UNMAPPED result, never an error.
 */

export const ERROR_CODES = {
  // Upstream table errors (fatal)
  UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
  MISSING_COLUMN: 'MISSING_COLUMN',
  EMPTY_TABLE: 'EMPTY_TABLE',
  PARSE_FAILED: 'PARSE_FAILED',

  // Configuration errors
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Output errors
  WRITE_FAILED: 'WRITE_FAILED',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class MapperError extends Error {
  readonly code: ErrorCode
  readonly details?: Record<string, unknown>

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MapperError'
    this.code = code
    this.details = details
  }
}

/**
 * A collaborator failed to supply the catalog or label table
 */
export class UpstreamDataError extends MapperError {
  readonly table: string

  constructor(
    table: string,
    message: string,
    code: ErrorCode = ERROR_CODES.UPSTREAM_UNAVAILABLE,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, { table, ...details }, options)
    this.name = 'UpstreamDataError'
    this.table = table
  }
}

export class ConfigError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.INVALID_CONFIG, details)
    this.name = 'ConfigError'
  }
}

export function isMapperError(error: unknown): error is MapperError {
  return error instanceof MapperError
}
