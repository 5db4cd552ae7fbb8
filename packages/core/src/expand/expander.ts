/**
 * Group expansion - cartesian expansion of parsed group patterns.
 * @packageDocumentation
 */

import type {
  ExpandOptions,
  ExpansionPair,
  GroupExpansionResult,
  GroupPattern,
  Group,
  PatternError,
  Span,
} from '../types'
import { PatternExpansionError } from '../types'
import { parseGroupPattern } from '../parse/group-parser'
import { resolveLimits } from '../parse/limits'
import { countPatternExpansions } from './count'
import { resolveExclusions } from './exclusions'

interface ExpansionState {
  source: string
  maxExpansion: number
}

/**
 * Expand a grouping pattern into concrete path or glob strings.
 *
 * Groups multiply out against the text around them, `-item` / `^item`
 * segments are excluded, and the excluded strings are removed from the
 * result. A malformed pattern yields an error and no paths.
 *
 * @example
 * expandGroupPattern('src/(main.ts, util/(fs, time), -util/time)').paths
 * // => ['src/main.ts', 'src/util/fs']
 *
 * Errors: `UNMATCHED_PAREN`, `NESTING_LIMIT` once groups nest deeper than
 * `maxDepth` (64 by default), and `EXPANSION_LIMIT` only when `maxExpansion`
 * is set.
 *
 * @param source - The pattern to expand
 * @param options - Expansion limits
 * @returns Resolved paths, or an error
 *
 * @public
 */
export function expandGroupPattern(source: string, options: ExpandOptions = {}): GroupExpansionResult {
  const resolved = resolveLimits(options)
  if (!resolved.ok) {
    return { source, paths: [], error: resolved.error }
  }

  const pattern = parseGroupPattern(source, resolved.limits)
  if (pattern.errors && pattern.errors.length > 0) {
    return { source, paths: [], error: pattern.errors[0] }
  }

  const { maxExpansion } = resolved.limits
  if (countPatternExpansions(pattern, maxExpansion) > maxExpansion) {
    return { source, paths: [], error: expansionLimitError(maxExpansion) }
  }

  try {
    const pairs = expandPairs(pattern, resolved.limits)
    return { source, paths: resolveExclusions(pairs).paths }
  } catch (error) {
    if (error instanceof PatternExpansionError) {
      return { source, paths: [], error: error.toPatternError() }
    }
    throw error
  }
}

/**
 * Expand a grouping pattern, throwing on failure.
 *
 * @param source - The pattern to expand
 * @param options - Expansion limits
 * @returns Resolved paths
 * @throws PatternExpansionError on an unmatched `(`, on nesting deeper than
 * `maxDepth` (64 by default), or past `maxExpansion` when one is set
 *
 * @public
 */
export function expandGroups(source: string, options: ExpandOptions = {}): readonly string[] {
  const result = expandGroupPattern(source, options)
  if (result.error) {
    throw new PatternExpansionError(source, result.error)
  }
  return result.paths
}

/**
 * Expand a parsed pattern into (string, excluded) pairs, before exclusions
 * are resolved.
 *
 * @param pattern - Parsed pattern without errors
 * @param options - Only `maxExpansion` applies here
 * @throws PatternExpansionError if the pattern carries parse errors or exceeds `maxExpansion`
 *
 * @public
 */
export function expandPairs(pattern: GroupPattern, options: ExpandOptions = {}): readonly ExpansionPair[] {
  const resolved = resolveLimits(options)
  if (!resolved.ok) {
    throw new PatternExpansionError(pattern.source, resolved.error)
  }
  if (pattern.errors && pattern.errors.length > 0) {
    throw new PatternExpansionError(pattern.source, pattern.errors[0])
  }

  const state: ExpansionState = {
    source: pattern.source,
    maxExpansion: resolved.limits.maxExpansion,
  }
  return expandSpan(pattern.root, state)
}

/**
 * Grow every accumulated string in lockstep: text is appended to each,
 * a group multiplies the accumulator by its alternatives.
 */
function expandSpan(span: Span, state: ExpansionState): ExpansionPair[] {
  let acc: ExpansionPair[] = [{ text: '', excluded: false }]

  for (const part of span.parts) {
    if (part.type === 'text') {
      acc = acc.map((pair) => ({ text: pair.text + part.value, excluded: pair.excluded }))
      continue
    }

    const alternatives = expandGroup(part, state)
    checkLimit(acc.length * alternatives.length, part, state)

    const next: ExpansionPair[] = []
    for (const prefix of acc) {
      for (const suffix of alternatives) {
        next.push({
          text: prefix.text + suffix.text,
          excluded: prefix.excluded || suffix.excluded,
        })
      }
    }
    acc = next
  }

  return acc
}

/**
 * Concatenate the expansions of every segment, in order, with the
 * segment's own exclusion ORed in.
 */
function expandGroup(group: Group, state: ExpansionState): ExpansionPair[] {
  const out: ExpansionPair[] = []

  for (const segment of group.segments) {
    for (const pair of expandSpan(segment.body, state)) {
      out.push({ text: pair.text, excluded: segment.excluded || pair.excluded })
    }
    checkLimit(out.length, group, state)
  }

  return out
}

function checkLimit(size: number, group: Group, state: ExpansionState): void {
  if (size > state.maxExpansion) {
    throw new PatternExpansionError(state.source, {
      ...expansionLimitError(state.maxExpansion),
      position: group.position,
    })
  }
}

function expansionLimitError(limit: number): PatternError {
  return {
    code: 'EXPANSION_LIMIT',
    message: `Pattern expands to more than ${limit} strings`,
  }
}
