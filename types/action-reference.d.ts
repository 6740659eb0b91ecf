/**
 * Parsed `uses` value of a step.
 */
export interface ActionReference {
  /**
   * Kind of action.
   */
  type: 'external' | 'docker' | 'local'

  /**
   * Version, tag or SHA after '@'; null for local and docker actions.
   */
  version: string | null

  /**
   * Action name without the version (e.g., 'actions/checkout').
   */
  name: string
}
