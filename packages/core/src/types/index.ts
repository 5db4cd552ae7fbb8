/**
 * Type definitions for the grouping pattern language.
 * @packageDocumentation
 */

// AST types
export type { GroupPattern, Span, SpanPart, TextPart, Group, GroupSegment, ExclusionMarker } from './ast'

// Expansion types
export type {
  ExpansionPair,
  ExclusionResolution,
  ExpandOptions,
  GroupExpansionResult,
  TargetKind,
  ExpansionTarget,
  InputExpansionResult,
} from './expansion'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { PatternExpansionError } from './errors'
