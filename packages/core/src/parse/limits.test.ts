import { describe, it, expect } from 'vitest'

import { resolveLimits, DEFAULT_MAX_EXPANSION, DEFAULT_MAX_DEPTH } from './limits'

describe('resolveLimits', () => {
  it('applies defaults', () => {
    expect(resolveLimits()).toEqual({
      ok: true,
      limits: { maxExpansion: DEFAULT_MAX_EXPANSION, maxDepth: DEFAULT_MAX_DEPTH },
    })
  })

  it('keeps explicit limits', () => {
    expect(resolveLimits({ maxExpansion: 5, maxDepth: Infinity })).toEqual({
      ok: true,
      limits: { maxExpansion: 5, maxDepth: Infinity },
    })
  })

  it('rejects non-positive and fractional limits', () => {
    expect(resolveLimits({ maxExpansion: -1 })).toEqual({
      ok: false,
      error: { code: 'INVALID_OPTION', message: 'maxExpansion must be a positive integer or Infinity, got -1' },
    })
    expect(resolveLimits({ maxDepth: 1.5 })).toEqual({
      ok: false,
      error: { code: 'INVALID_OPTION', message: 'maxDepth must be a positive integer or Infinity, got 1.5' },
    })
  })
})
