/**
 * Path Grouping Library
 *
 * Expands compact grouping patterns such as `src/(main.ts, util/(fs, time), -tests)`
 * into concrete path or glob strings, with exclusions already resolved.
 * Designed for downstream use by file-selection tools.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  GroupPattern,
  Span,
  SpanPart,
  TextPart,
  Group,
  GroupSegment,
  ExclusionMarker,
  // Expansion types
  ExpansionPair,
  ExclusionResolution,
  ExpandOptions,
  GroupExpansionResult,
  TargetKind,
  ExpansionTarget,
  InputExpansionResult,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { PatternExpansionError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parseGroupPattern } from './parse'
export { validateGroupPattern, isValidGroupPattern } from './parse'
export { resolveLimits, DEFAULT_MAX_EXPANSION, DEFAULT_MAX_DEPTH, type ExpansionLimits, type LimitsResolution } from './parse'

// =============================================================================
// Expansion
// =============================================================================

export { expandGroupPattern, expandGroups, expandPairs } from './expand'
export { resolveExclusions } from './expand'
export { countGroupExpansions, countPatternExpansions } from './expand'

// =============================================================================
// Routing
// =============================================================================

export { isGlob, hasGroupSyntax, classifyTarget, expandInputs } from './route'
