/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parseGroupPattern } from './group-parser'
export { validateGroupPattern, isValidGroupPattern } from './validator'
export { resolveLimits, DEFAULT_MAX_EXPANSION, DEFAULT_MAX_DEPTH, type ExpansionLimits, type LimitsResolution } from './limits'
