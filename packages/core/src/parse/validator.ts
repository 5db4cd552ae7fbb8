/**
 * Pattern validation - checks structure and expansion limits.
 * @packageDocumentation
 */

import type { ExpandOptions, PatternError } from '../types'
import { countPatternExpansions } from '../expand/count'
import { parseGroupPattern } from './group-parser'
import { resolveLimits } from './limits'

/**
 * Validate a grouping pattern without expanding it.
 *
 * Returns errors for:
 * - Invalid options
 * - Unmatched `(`
 * - Nesting deeper than `maxDepth`
 * - Expansion larger than `maxExpansion`
 *
 * @param source - The pattern to validate
 * @param options - Expansion limits
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validateGroupPattern(source: string, options: ExpandOptions = {}): readonly PatternError[] {
  const resolved = resolveLimits(options)
  if (!resolved.ok) {
    return [resolved.error]
  }

  const pattern = parseGroupPattern(source, resolved.limits)

  // Structural errors stop parsing, so there is nothing to count
  if (pattern.errors) {
    return pattern.errors
  }

  const { maxExpansion } = resolved.limits
  if (countPatternExpansions(pattern, maxExpansion) > maxExpansion) {
    return [
      {
        code: 'EXPANSION_LIMIT',
        message: `Pattern expands to more than ${maxExpansion} strings`,
      },
    ]
  }

  return []
}

/**
 * Check if a pattern is valid (has no errors).
 *
 * @param source - The pattern to check
 * @param options - Expansion limits
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidGroupPattern(source: string, options: ExpandOptions = {}): boolean {
  return validateGroupPattern(source, options).length === 0
}
