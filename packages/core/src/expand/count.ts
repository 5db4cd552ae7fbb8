/**
 * Expansion counting without building strings.
 * @packageDocumentation
 */

import type { ExpandOptions, GroupPattern, Group, Span } from '../types'
import { parseGroupPattern } from '../parse/group-parser'
import { DEFAULT_MAX_EXPANSION } from '../parse/limits'

/**
 * Count the strings (included and excluded) a pattern would expand to.
 * Does not actually expand - useful for limit checking.
 *
 * @param source - Pattern source string
 * @param options - `maxExpansion` is the count above which counting stops (default: unlimited);
 * `maxDepth` bounds nesting as for expansion
 * @returns Exact count, Infinity once it exceeds `maxExpansion`, or NaN if the pattern does not parse
 *
 * @public
 */
export function countGroupExpansions(source: string, options: ExpandOptions = {}): number {
  const pattern = parseGroupPattern(source, options)
  if (pattern.errors) {
    return NaN
  }
  return countPatternExpansions(pattern, options.maxExpansion ?? DEFAULT_MAX_EXPANSION)
}

/**
 * {@link countGroupExpansions} over an already parsed pattern.
 *
 * @public
 */
export function countPatternExpansions(pattern: GroupPattern, limit: number = DEFAULT_MAX_EXPANSION): number {
  return countSpan(pattern.root, limit)
}

function countSpan(span: Span, limit: number): number {
  let count = 1

  // Keep scanning past an oversized product: a later empty group still empties it
  for (const part of span.parts) {
    if (part.type === 'text') continue

    const alternatives = countGroup(part, limit)
    if (alternatives === 0) {
      return 0
    }
    count *= alternatives
  }

  return count > limit ? Infinity : count
}

function countGroup(group: Group, limit: number): number {
  let total = 0

  for (const segment of group.segments) {
    total += countSpan(segment.body, limit)
    if (total > limit) {
      return Infinity
    }
  }

  return total
}
