/**
 * Routing of expanded strings to glob or path resolution.
 * @packageDocumentation
 */

import type { ExpandOptions, ExpansionTarget, InputExpansionResult } from '../types'
import { expandGroupPattern } from '../expand/expander'
import { resolveLimits } from '../parse/limits'

const GLOB_CHARS = ['*', '?', '[']

/**
 * Heuristic: does the string look like a glob?
 *
 * @public
 */
export function isGlob(pattern: string): boolean {
  return GLOB_CHARS.some((char) => pattern.includes(char))
}

/**
 * Whether an input uses grouping syntax at all.
 *
 * @public
 */
export function hasGroupSyntax(input: string): boolean {
  return input.includes('(')
}

/**
 * Tag an expanded string with how it should be resolved.
 *
 * @param input - Raw input the string was expanded from
 * @param pattern - The expanded string
 *
 * @public
 */
export function classifyTarget(input: string, pattern: string): ExpansionTarget {
  return { input, pattern, kind: isGlob(pattern) ? 'glob' : 'path' }
}

/**
 * Expand a list of raw inputs into routed targets.
 *
 * Inputs without `(` pass through verbatim. The first input that fails to
 * expand fails the whole list.
 *
 * @example
 * expandInputs(['README.md', 'src/(index.ts, *.test.ts)']).targets
 * // => [
 * //   { input: 'README.md', pattern: 'README.md', kind: 'path' },
 * //   { input: 'src/(index.ts, *.test.ts)', pattern: 'src/index.ts', kind: 'path' },
 * //   { input: 'src/(index.ts, *.test.ts)', pattern: 'src/*.test.ts', kind: 'glob' },
 * // ]
 *
 * @public
 */
export function expandInputs(inputs: readonly string[], options: ExpandOptions = {}): InputExpansionResult {
  const resolved = resolveLimits(options)
  if (!resolved.ok) {
    return { targets: [], error: resolved.error }
  }

  const targets: ExpansionTarget[] = []

  for (const input of inputs) {
    if (!hasGroupSyntax(input)) {
      targets.push(classifyTarget(input, input))
      continue
    }

    const result = expandGroupPattern(input, resolved.limits)
    if (result.error) {
      return { targets: [], error: result.error, failedInput: input }
    }
    for (const pattern of result.paths) {
      targets.push(classifyTarget(input, pattern))
    }
  }

  return { targets }
}
