/**
 * Expansion limits and option resolution.
 * @packageDocumentation
 */

import type { ExpandOptions, PatternError } from '../types'

/**
 * Default maximum number of strings a pattern may expand to.
 * Unlimited: callers that expand untrusted patterns should set their own.
 *
 * @public
 */
export const DEFAULT_MAX_EXPANSION = Infinity

/**
 * Default maximum group nesting depth.
 *
 * @public
 */
export const DEFAULT_MAX_DEPTH = 64

/**
 * Limits with every default applied.
 * @public
 */
export interface ExpansionLimits {
  readonly maxExpansion: number
  readonly maxDepth: number
}

/**
 * @public
 */
export type LimitsResolution =
  | { readonly ok: true; readonly limits: ExpansionLimits }
  | { readonly ok: false; readonly error: PatternError }

/**
 * Apply defaults to expansion options and check them.
 *
 * Each limit must be a positive integer, or `Infinity` to disable it.
 *
 * @public
 */
export function resolveLimits(options: ExpandOptions = {}): LimitsResolution {
  const maxExpansion = options.maxExpansion ?? DEFAULT_MAX_EXPANSION
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH

  const checks = [
    ['maxExpansion', maxExpansion],
    ['maxDepth', maxDepth],
  ] as const

  for (const [name, value] of checks) {
    if (!isValidLimit(value)) {
      return {
        ok: false,
        error: {
          code: 'INVALID_OPTION',
          message: `${name} must be a positive integer or Infinity, got ${value}`,
        },
      }
    }
  }

  return { ok: true, limits: { maxExpansion, maxDepth } }
}

function isValidLimit(value: number): boolean {
  return value === Infinity || (Number.isInteger(value) && value > 0)
}
