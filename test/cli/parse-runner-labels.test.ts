import { describe, expect, it } from 'vitest'

import { parseRunnerLabels } from '../../cli/parse-runner-labels'

describe('parseRunnerLabels', () => {
  it('returns an empty table without options', () => {
    expect(parseRunnerLabels(undefined)).toEqual({})
  })

  it('parses a single mapping', () => {
    expect(parseRunnerLabels('self-hosted=linux')).toEqual({
      'self-hosted': 'linux',
    })
  })

  it('parses repeated and comma-separated mappings', () => {
    expect(
      parseRunnerLabels(['mac-mini = macos, build-box=Windows', 'gpu=linux']),
    ).toEqual({
      'build-box': 'windows',
      'mac-mini': 'macos',
      gpu: 'linux',
    })
  })

  it('throws on malformed mappings', () => {
    expect(() => parseRunnerLabels('self-hosted')).toThrowError(
      'Invalid --runner value "self-hosted". Expected "label=linux|macos|windows".',
    )
    expect(() => parseRunnerLabels('=linux')).toThrowError(
      'Invalid --runner value "=linux"',
    )
    expect(() => parseRunnerLabels('box=solaris')).toThrowError(
      'Invalid --runner value "box=solaris"',
    )
  })
})
