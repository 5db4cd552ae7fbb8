import type { PatternError } from './errors'

// =============================================================================
// GROUP PATTERN AST
// =============================================================================

/**
 * Root node - the entry point for any parsed group pattern.
 * @public
 */
export interface GroupPattern {
  /** Original pattern string for error messages and debugging */
  readonly source: string

  /** Parsed structure */
  readonly root: Span

  /** Deepest group nesting encountered (0 when the pattern has no groups) */
  readonly depth: number

  /** Parse errors, if any */
  readonly errors?: readonly PatternError[]
}

/**
 * A run of literal text and groups, concatenated left to right.
 *
 * @example
 * "src/(a,b).ts" becomes:
 *   parts: [Text("src/"), Group([a, b]), Text(".ts")]
 *
 * @public
 */
export interface Span {
  readonly type: 'span'
  readonly parts: readonly SpanPart[]
}

/**
 * @public
 */
export type SpanPart = TextPart | Group

/**
 * Literal characters. `)` and `,` outside a group are literal too.
 * @public
 */
export interface TextPart {
  readonly type: 'text'
  readonly value: string
}

/**
 * A parenthesized list of alternatives.
 *
 * Blank segments are dropped during parsing, so `segments` may be empty
 * (`()` or `( , )`), in which case the group contributes no alternatives.
 *
 * @public
 */
export interface Group {
  readonly type: 'group'

  /** Index of the opening `(` in the source */
  readonly position: number

  readonly segments: readonly GroupSegment[]
}

/**
 * Leading character that marks a segment as excluded.
 * @public
 */
export type ExclusionMarker = '-' | '^'

/**
 * One comma-delimited alternative within a group, already trimmed.
 * @public
 */
export interface GroupSegment {
  /** Whether the segment carried an exclusion marker */
  readonly excluded: boolean

  /** The stripped marker, when `excluded` */
  readonly marker?: ExclusionMarker

  /** Segment body after the marker */
  readonly body: Span

  /** Index of the segment's first non-blank character in the source */
  readonly position: number
}
