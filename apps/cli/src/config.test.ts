import { describe, expect, it } from 'vitest'

import { resolveConfig } from './config'

describe('resolveConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(resolveConfig({})).toEqual({
      xyzComment: 'Generated by sandwich-geometry',
      quiet: false,
    })
  })

  it('reads the comment and quiet flag from the environment', () => {
    expect(
      resolveConfig({ SANDWICH_XYZ_COMMENT: '  ferrocene run  ', SANDWICH_QUIET: 'TRUE' }),
    ).toEqual({ xyzComment: 'ferrocene run', quiet: true })
  })

  it('ignores blank comments and unrecognized flags', () => {
    expect(resolveConfig({ SANDWICH_XYZ_COMMENT: '   ', SANDWICH_QUIET: 'maybe' })).toEqual({
      xyzComment: 'Generated by sandwich-geometry',
      quiet: false,
    })
  })
})
