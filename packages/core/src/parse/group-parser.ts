/**
 * Group pattern parser - converts grouping pattern strings to AST.
 * @packageDocumentation
 */

import type {
  ExpandOptions,
  GroupPattern,
  Group,
  GroupSegment,
  PatternError,
  Span,
  SpanPart,
} from '../types'
import { resolveLimits } from './limits'

/**
 * Parser state for tracking nesting and errors.
 */
interface ParserState {
  source: string
  maxDepth: number
  deepest: number
  errors: PatternError[]
}

/** Same character set String.prototype.trim removes */
const BLANK = /\s/

/**
 * Parse a grouping pattern into an AST.
 *
 * Parsing stops at the first error; the returned root then holds whatever
 * was parsed before it.
 *
 * @example
 * parseGroupPattern('src/(a.ts, -b.ts)')
 * // root: Span([Text("src/"), Group([Segment(a.ts), Segment(-, b.ts)])])
 *
 * @param source - The pattern string to parse
 * @param options - Limits; only `maxDepth` applies here
 * @returns Parsed GroupPattern with AST and any errors
 *
 * @public
 */
export function parseGroupPattern(source: string, options: ExpandOptions = {}): GroupPattern {
  const resolved = resolveLimits(options)
  if (!resolved.ok) {
    return { source, root: { type: 'span', parts: [] }, depth: 0, errors: [resolved.error] }
  }

  const state: ParserState = {
    source,
    maxDepth: resolved.limits.maxDepth,
    deepest: 0,
    errors: [],
  }

  const root = parseSpan(state, 0, source.length, 0)

  return {
    source,
    root,
    depth: state.deepest,
    errors: state.errors.length > 0 ? state.errors : undefined,
  }
}

/**
 * Parse literal text and groups between `start` and `end`.
 * Only `(` is structural here; `)` and `,` are literal.
 */
function parseSpan(state: ParserState, start: number, end: number, depth: number): Span {
  const { source } = state
  const parts: SpanPart[] = []
  let textStart = start
  let i = start

  while (i < end) {
    if (source[i] !== '(') {
      i++
      continue
    }

    if (i > textStart) {
      parts.push({ type: 'text', value: source.slice(textStart, i) })
    }

    const parsed = parseGroup(state, i, end, depth + 1)
    if (!parsed) {
      return { type: 'span', parts }
    }

    parts.push(parsed.group)
    i = parsed.next
    textStart = i
  }

  if (end > textStart) {
    parts.push({ type: 'text', value: source.slice(textStart, end) })
  }

  return { type: 'span', parts }
}

/**
 * Parse the comma-separated list after the `(` at `open`.
 * Returns the group and the index just past its closing `)`, or undefined
 * after recording an error.
 */
function parseGroup(
  state: ParserState,
  open: number,
  end: number,
  depth: number,
): { group: Group; next: number } | undefined {
  const { source } = state

  if (depth > state.maxDepth) {
    state.errors.push({
      code: 'NESTING_LIMIT',
      message: `Groups nested deeper than ${state.maxDepth} levels`,
      position: open,
      length: 1,
    })
    return undefined
  }
  state.deepest = Math.max(state.deepest, depth)

  // Split at top-level commas, up to the matching )
  const bounds: Array<[number, number]> = []
  let nested = 0
  let segmentStart = open + 1
  let close = -1

  for (let i = open + 1; i < end; i++) {
    const char = source[i]

    if (char === '(') {
      nested++
    } else if (char === ')') {
      if (nested === 0) {
        bounds.push([segmentStart, i])
        close = i
        break
      }
      nested--
    } else if (char === ',' && nested === 0) {
      bounds.push([segmentStart, i])
      segmentStart = i + 1
    }
  }

  if (close < 0) {
    state.errors.push({
      code: 'UNMATCHED_PAREN',
      message: `Unmatched '(' at position ${open}`,
      position: open,
      length: end - open,
    })
    return undefined
  }

  const segments: GroupSegment[] = []
  for (const [segmentFrom, segmentTo] of bounds) {
    const segment = parseSegment(state, segmentFrom, segmentTo, depth)
    if (state.errors.length > 0) {
      return undefined
    }
    if (segment) {
      segments.push(segment)
    }
  }

  return {
    group: { type: 'group', position: open, segments },
    next: close + 1,
  }
}

/**
 * Trim a segment, strip its exclusion marker and parse the body.
 * Blank segments yield undefined.
 */
function parseSegment(state: ParserState, start: number, end: number, depth: number): GroupSegment | undefined {
  const { source } = state

  while (start < end && BLANK.test(source[start])) start++
  while (end > start && BLANK.test(source[end - 1])) end--

  if (start === end) {
    return undefined
  }

  const first = source[start]
  if (first === '-' || first === '^') {
    return {
      excluded: true,
      marker: first,
      body: parseSpan(state, start + 1, end, depth),
      position: start,
    }
  }

  return {
    excluded: false,
    body: parseSpan(state, start, end, depth),
    position: start,
  }
}
