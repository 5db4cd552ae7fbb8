import { describe, it, expect } from 'vitest'

import { parseGroupPattern } from './group-parser'
import type { Group, TextPart } from '../types'

describe('parseGroupPattern', () => {
  describe('literal text', () => {
    it('parses a pattern without groups as one text part', () => {
      const pattern = parseGroupPattern('README.md')

      expect(pattern.source).toBe('README.md')
      expect(pattern.depth).toBe(0)
      expect(pattern.errors).toBeUndefined()
      expect(pattern.root.parts).toEqual([{ type: 'text', value: 'README.md' }])
    })

    it('treats a stray ) as literal', () => {
      const pattern = parseGroupPattern('a)b')

      expect(pattern.errors).toBeUndefined()
      expect(pattern.root.parts).toEqual([{ type: 'text', value: 'a)b' }])
    })

    it('treats top-level commas and markers as literal', () => {
      const pattern = parseGroupPattern('-a,b')

      expect(pattern.root.parts).toEqual([{ type: 'text', value: '-a,b' }])
    })

    it('parses the empty pattern', () => {
      const pattern = parseGroupPattern('')

      expect(pattern.root.parts).toEqual([])
      expect(pattern.errors).toBeUndefined()
    })
  })

  describe('groups', () => {
    it('parses text around a group', () => {
      const pattern = parseGroupPattern('src/(a.ts, -b.ts)')

      expect(pattern.depth).toBe(1)
      expect(pattern.root.parts).toHaveLength(2)
      expect(pattern.root.parts[0]).toEqual({ type: 'text', value: 'src/' })

      const group = pattern.root.parts[1] as Group
      expect(group.type).toBe('group')
      expect(group.position).toBe(4)
      expect(group.segments).toEqual([
        { excluded: false, body: { type: 'span', parts: [{ type: 'text', value: 'a.ts' }] }, position: 5 },
        {
          excluded: true,
          marker: '-',
          body: { type: 'span', parts: [{ type: 'text', value: 'b.ts' }] },
          position: 11,
        },
      ])
    })

    it('records the caret marker', () => {
      const group = parseGroupPattern('(^x)').root.parts[0] as Group

      expect(group.segments[0].excluded).toBe(true)
      expect(group.segments[0].marker).toBe('^')
    })

    it('strips only the marker, not the blank after it', () => {
      const group = parseGroupPattern('(- x)').root.parts[0] as Group

      expect(group.segments[0].body.parts).toEqual([{ type: 'text', value: ' x' }])
    })

    it('drops blank segments', () => {
      const group = parseGroupPattern('( , a,,)').root.parts[0] as Group

      expect(group.segments).toHaveLength(1)
      expect(group.segments[0].body.parts).toEqual([{ type: 'text', value: 'a' }])
    })

    it('parses an empty group', () => {
      const group = parseGroupPattern('a()b').root.parts[1] as Group

      expect(group.segments).toEqual([])
    })

    it('does not split on commas inside nested groups', () => {
      const pattern = parseGroupPattern('a(b,(c,d))')

      expect(pattern.depth).toBe(2)
      const outer = pattern.root.parts[1] as Group
      expect(outer.segments).toHaveLength(2)

      const inner = outer.segments[1].body.parts[0] as Group
      expect(inner.type).toBe('group')
      expect(inner.position).toBe(4)
      expect(inner.segments.map((s) => (s.body.parts[0] as TextPart).value)).toEqual(['c', 'd'])
    })

    it('resumes after the closing )', () => {
      const pattern = parseGroupPattern('(a,b)-x)')

      expect(pattern.root.parts[1]).toEqual({ type: 'text', value: '-x)' })
    })
  })

  describe('errors', () => {
    it('reports an unmatched (', () => {
      const pattern = parseGroupPattern('a(b,c')

      expect(pattern.errors).toEqual([
        { code: 'UNMATCHED_PAREN', message: "Unmatched '(' at position 1", position: 1, length: 4 },
      ])
    })

    it('reports the enclosing group when a nested group closes it', () => {
      const pattern = parseGroupPattern('a(b,(c)')

      expect(pattern.errors).toHaveLength(1)
      expect(pattern.errors?.[0].code).toBe('UNMATCHED_PAREN')
      expect(pattern.errors?.[0].position).toBe(1)
    })

    it('reports groups nested deeper than maxDepth', () => {
      const pattern = parseGroupPattern('((a))', { maxDepth: 1 })

      expect(pattern.errors).toEqual([
        { code: 'NESTING_LIMIT', message: 'Groups nested deeper than 1 levels', position: 1, length: 1 },
      ])
    })

    it('accepts nesting up to maxDepth', () => {
      const pattern = parseGroupPattern('((a))', { maxDepth: 2 })

      expect(pattern.errors).toBeUndefined()
      expect(pattern.depth).toBe(2)
    })

    it('reports invalid options', () => {
      const pattern = parseGroupPattern('(a)', { maxDepth: 0 })

      expect(pattern.errors?.[0].code).toBe('INVALID_OPTION')
      expect(pattern.root.parts).toEqual([])
    })
  })
})
