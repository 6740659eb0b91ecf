import type { Platform } from '../types/platform'

/** Directory holding workflow files. */
export const WORKFLOWS_DIRECTORY = '.github/workflows'

/** Shell used for `run` steps when neither the step nor the job sets one. */
export const DEFAULT_SHELL = 'bash -e {0}'

/** Runner label prefixes known without extra configuration. */
export const RUNNER_PLATFORMS: Record<string, Platform> = {
  windows: 'windows',
  ubuntu: 'linux',
  macos: 'macos',
  linux: 'linux',
}

/** Runner OS names exposed to expressions as `runner.os`. */
export const RUNNER_OS_NAMES: Record<Platform, string> = {
  windows: 'Windows',
  linux: 'Linux',
  macos: 'macOS',
}

/** Matrix keys that hold rules rather than dimensions. */
export const RESERVED_MATRIX_KEYS = new Set(['include', 'exclude'])
