import type { PatternError } from './errors'

/**
 * A fully expanded string and whether any enclosing segment excluded it.
 * @public
 */
export interface ExpansionPair {
  readonly text: string
  readonly excluded: boolean
}

/**
 * Expansion pairs partitioned by their exclusion flag.
 * @public
 */
export interface ExclusionResolution {
  /** Included strings in first-seen order (may repeat) */
  readonly includes: readonly string[]

  /** Every excluded string */
  readonly excludes: ReadonlySet<string>

  /** Includes that are not excluded, in first-seen order (may repeat) */
  readonly paths: readonly string[]
}

/**
 * Options for expansion.
 *
 * @public
 */
export interface ExpandOptions {
  /**
   * Maximum number of strings (included and excluded) a pattern may expand to.
   * Checked against the total before any string is built, and against
   * every intermediate list while expanding.
   * @defaultValue Infinity
   */
  readonly maxExpansion?: number

  /**
   * Maximum group nesting depth.
   * @defaultValue 64
   */
  readonly maxDepth?: number
}

/**
 * Result of expanding one pattern.
 * @public
 */
export interface GroupExpansionResult {
  /** Pattern that was expanded */
  readonly source: string

  /** Resolved strings; empty when `error` is set */
  readonly paths: readonly string[]

  /**
   * `UNMATCHED_PAREN`, `NESTING_LIMIT` (on by default, see `maxDepth`),
   * `EXPANSION_LIMIT` (only when `maxExpansion` is set) or `INVALID_OPTION`
   */
  readonly error?: PatternError
}

/**
 * How a caller should resolve an expanded string.
 * - glob: contains glob metacharacters
 * - path: a literal file or directory path
 *
 * @public
 */
export type TargetKind = 'glob' | 'path'

/**
 * An expanded string tagged with its routing.
 * @public
 */
export interface ExpansionTarget {
  /** Raw input the pattern came from */
  readonly input: string

  /** Expanded string */
  readonly pattern: string

  readonly kind: TargetKind
}

/**
 * Result of expanding a list of raw inputs.
 * @public
 */
export interface InputExpansionResult {
  /** Targets of every input, in input order; empty when `error` is set */
  readonly targets: readonly ExpansionTarget[]

  readonly error?: PatternError

  /** The input that produced `error` */
  readonly failedInput?: string
}
