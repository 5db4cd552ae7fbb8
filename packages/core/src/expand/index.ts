/**
 * Group expansion utilities.
 * @packageDocumentation
 */

export { expandGroupPattern, expandGroups, expandPairs } from './expander'
export { resolveExclusions } from './exclusions'
export { countGroupExpansions, countPatternExpansions } from './count'
