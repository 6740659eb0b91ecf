import pc from 'picocolors'

import type { StepResult, SkipReason } from '../types/step-result'

const SKIP_DESCRIPTIONS: Record<SkipReason, string> = {
  'prior-failure': 'an earlier step failed',
  'condition-error': 'invalid condition',
  platform: 'not for this platform',
  condition: 'condition is false',
  cancelled: 'cancelled',
}

/**
 * Formats one line of a job's step log.
 *
 * @param result - Step result.
 * @returns Colored line without indentation.
 */
export function formatStepResult(result: StepResult): string {
  switch (result.status) {
    case 'succeeded':
      return `${pc.green('✓')} ${result.name}`
    case 'failed': {
      let error = result.error ?? 'step failed'
      if (result.policy === 'tolerant') {
        return `${pc.yellow('!')} ${result.name} ${pc.yellow(
          `(failed, continued: ${error})`,
        )}`
      }
      return `${pc.redBright('✗')} ${result.name} ${pc.redBright(`(${error})`)}`
    }
    case 'skipped': {
      let reason = SKIP_DESCRIPTIONS[result.skipReason ?? 'condition']
      return `${pc.gray('-')} ${pc.gray(`${result.name} (skipped: ${reason})`)}`
    }
  }
}
