/** Host platform a runner label resolves to. */
export type Platform = 'windows' | 'macos' | 'linux'
