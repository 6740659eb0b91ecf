import { DEFAULT_SHELL } from '../constants'

/** Command templates for shells referred to by name. */
const NAMED_SHELLS: Record<string, string> = {
  bash: 'bash --noprofile --norc -eo pipefail {0}',
  python: 'python {0}',
  sh: 'sh -e {0}',
}

/**
 * Expands a shell setting into the program and arguments that run a script.
 *
 * A named shell uses its template. A custom command must contain `{0}`,
 * which is replaced with the script path; without it the path is appended.
 *
 * @example
 *   resolveShellCommand('bash --noprofile --norc -exo pipefail {0}', '/tmp/s')
 *   // => { command: 'bash', args: ['--noprofile', '--norc', '-exo', 'pipefail', '/tmp/s'] }
 *
 * @param shell - Shell name or command template; the default shell when
 *   undefined.
 * @param scriptPath - Path of the script file.
 * @returns Program and arguments.
 */
export function resolveShellCommand(
  shell: undefined | string,
  scriptPath: string,
): { command: string; args: string[] } {
  let template = shell?.trim() || DEFAULT_SHELL
  template = NAMED_SHELLS[template] ?? template
  if (!template.includes('{0}')) {
    template = `${template} {0}`
  }

  let [command = 'bash', ...args] = template
    .split(/\s+/u)
    .filter(Boolean)
    .map(part => part.replaceAll('{0}', scriptPath))

  return { command, args }
}
