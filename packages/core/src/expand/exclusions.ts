/**
 * Include/exclude resolution over expansion pairs.
 * @packageDocumentation
 */

import type { ExpansionPair, ExclusionResolution } from '../types'

/**
 * Partition expansion pairs and subtract the excluded strings.
 *
 * A string produced both as an include and as an exclude, anywhere in the
 * pattern, never reaches `paths`. Repeated includes are kept; deduplicating
 * is left to whatever resolves the strings to files.
 *
 * @example
 * resolveExclusions([
 *   { text: 'src/a', excluded: false },
 *   { text: 'src/b', excluded: false },
 *   { text: 'src/b', excluded: true },
 * ]).paths
 * // => ['src/a']
 *
 * @public
 */
export function resolveExclusions(pairs: readonly ExpansionPair[]): ExclusionResolution {
  const includes: string[] = []
  const excludes = new Set<string>()

  for (const pair of pairs) {
    if (pair.excluded) {
      excludes.add(pair.text)
    } else {
      includes.push(pair.text)
    }
  }

  const paths = includes.filter((text) => !excludes.has(text))

  return { includes, excludes, paths }
}
