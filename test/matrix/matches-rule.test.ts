import { describe, expect, it } from 'vitest'

import { matchesRule } from '../../core/matrix/matches-rule'

describe('matchesRule', () => {
  let combination = { os: 'A', ver: 1 }

  it('matches when every named key is equal', () => {
    expect(matchesRule(combination, { os: 'A', ver: 1 })).toBeTruthy()
  })

  it('treats unnamed keys as wildcards', () => {
    expect(matchesRule(combination, { os: 'A' })).toBeTruthy()
    expect(matchesRule(combination, {})).toBeTruthy()
  })

  it('does not match different values', () => {
    expect(matchesRule(combination, { os: 'B' })).toBeFalsy()
  })

  it('compares values strictly', () => {
    expect(matchesRule(combination, { ver: '1' })).toBeFalsy()
  })

  it('never matches keys the combination lacks', () => {
    expect(matchesRule(combination, { arch: 'arm64' })).toBeFalsy()
  })

  it('compares only the given keys', () => {
    expect(
      matchesRule(combination, { os: 'A', extra: 'x' }, ['os']),
    ).toBeTruthy()
  })
})
