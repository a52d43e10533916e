/**
 * What to do with a staged candidate once its diff is known.
 *
 * Evaluated top to bottom, first match wins:
 *
 * | diff      | dryRun | commitOnSuccess | action          |
 * |-----------|--------|-----------------|-----------------|
 * | empty     | any    | any             | no_op           |
 * | non-empty | true   | any             | dry_run_discard |
 * | non-empty | false  | false           | discard         |
 * | non-empty | false  | true            | commit          |
 */

export type DeploymentAction = 'no_op' | 'dry_run_discard' | 'discard' | 'commit'

export interface DecisionInput {
  diffText: string
  dryRun: boolean
  commitOnSuccess: boolean
}

export function decideAction(input: DecisionInput): DeploymentAction {
  if (input.diffText.trim() === '') return 'no_op'
  if (input.dryRun) return 'dry_run_discard'
  if (!input.commitOnSuccess) return 'discard'
  return 'commit'
}
