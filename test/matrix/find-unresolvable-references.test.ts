import { describe, expect, it } from 'vitest'

import { findUnresolvableReferences } from '../../core/matrix/find-unresolvable-references'

describe('findUnresolvableReferences', () => {
  it('reports unknown dimensions and values', () => {
    expect(
      findUnresolvableReferences({
        include: [
          { extra: 'y', os: 'C' },
          { extra: 'x', ver: 1 },
        ],
        exclude: [{ os: 'C' }, { arch: 'arm64' }],
        dimensions: [
          { values: ['A', 'B'], name: 'os' },
          { values: [1, 2], name: 'ver' },
        ],
        maxParallel: null,
        failFast: true,
      }),
    ).toEqual([
      {
        message: 'exclude[0] names undeclared value "C" for "os"',
        kind: 'UnresolvableDimensionValue',
      },
      {
        message: 'exclude[1] names unknown dimension "arch"',
        kind: 'UnresolvableDimensionValue',
      },
      {
        message: 'include[0] names undeclared value "C" for "os"',
        kind: 'UnresolvableDimensionValue',
      },
    ])
  })

  it('reports values of a different type', () => {
    expect(
      findUnresolvableReferences({
        dimensions: [{ values: [1, 2], name: 'ver' }],
        exclude: [{ ver: '1' }],
        maxParallel: null,
        failFast: true,
        include: [],
      }),
    ).toEqual([
      {
        message: 'exclude[0] names undeclared value "1" for "ver"',
        kind: 'UnresolvableDimensionValue',
      },
    ])
  })

  it('returns nothing for resolvable rules', () => {
    expect(
      findUnresolvableReferences({
        dimensions: [{ values: ['A', 'B'], name: 'os' }],
        include: [{ experimental: true, os: 'A' }],
        exclude: [{ os: 'B' }],
        maxParallel: null,
        failFast: true,
      }),
    ).toEqual([])
  })
})
