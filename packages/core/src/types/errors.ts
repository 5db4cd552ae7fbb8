/**
 * Error codes for pattern expansion failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNMATCHED_PAREN' // a(b,c without )
  | 'NESTING_LIMIT' // Groups nested deeper than maxDepth
  | 'EXPANSION_LIMIT' // Cartesian product larger than maxExpansion
  | 'INVALID_OPTION' // Non-positive or fractional limit

/**
 * A pattern error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown by {@link expandGroups} when a pattern cannot be expanded.
 *
 * Carries the same fields as the {@link PatternError} returned by
 * `expandGroupPattern`, plus the offending source.
 *
 * @public
 */
export class PatternExpansionError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Pattern that failed to expand */
  readonly source: string

  readonly position?: number

  readonly length?: number

  constructor(source: string, error: PatternError) {
    super(error.message)
    this.name = 'PatternExpansionError'
    this.code = error.code
    this.source = source
    this.position = error.position
    this.length = error.length
  }

  /** The error as a plain {@link PatternError} record */
  toPatternError(): PatternError {
    return {
      code: this.code,
      message: this.message,
      position: this.position,
      length: this.length,
    }
  }
}
