import { describe, it, expect } from 'vitest'

import { resolveExclusions } from './exclusions'

describe('resolveExclusions', () => {
  it('partitions pairs by their flag', () => {
    const result = resolveExclusions([
      { text: 'a', excluded: false },
      { text: 'b', excluded: false },
      { text: 'a', excluded: false },
      { text: 'b', excluded: true },
      { text: 'c', excluded: true },
    ])

    expect(result.includes).toEqual(['a', 'b', 'a'])
    expect(result.excludes).toEqual(new Set(['b', 'c']))
    expect(result.paths).toEqual(['a', 'a'])
  })

  it('excludes regardless of where the exclusion appears', () => {
    const before = resolveExclusions([
      { text: 'x', excluded: true },
      { text: 'x', excluded: false },
      { text: 'y', excluded: false },
    ])

    expect(before.paths).toEqual(['y'])
  })

  it('preserves order and repeats of includes', () => {
    const result = resolveExclusions([
      { text: 'z', excluded: false },
      { text: 'a', excluded: false },
      { text: 'm', excluded: false },
      { text: 'a', excluded: false },
    ])

    expect(result.paths).toEqual(['z', 'a', 'm', 'a'])
  })

  it('returns nothing for no pairs', () => {
    const result = resolveExclusions([])

    expect(result.includes).toEqual([])
    expect(result.excludes.size).toBe(0)
    expect(result.paths).toEqual([])
  })
})
