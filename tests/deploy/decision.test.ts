import { describe, it, expect } from 'vitest'
import { decideAction, type DeploymentAction } from '../../src/deploy/decision.js'

describe('decideAction', () => {
  const table: Array<[string, boolean, boolean, DeploymentAction]> = [
    ['', false, false, 'no_op'],
    ['', false, true, 'no_op'],
    ['', true, false, 'no_op'],
    ['', true, true, 'no_op'],
    ['+ip routing', false, false, 'discard'],
    ['+ip routing', false, true, 'commit'],
    ['+ip routing', true, false, 'dry_run_discard'],
    ['+ip routing', true, true, 'dry_run_discard']
  ]

  it.each(table)('diff=%j dryRun=%s commitOnSuccess=%s → %s', (diffText, dryRun, commitOnSuccess, expected) => {
    expect(decideAction({ diffText, dryRun, commitOnSuccess })).toBe(expected)
  })

  it('should treat a whitespace-only diff as empty', () => {
    expect(decideAction({ diffText: ' \n\t\n', dryRun: false, commitOnSuccess: true })).toBe('no_op')
  })
})
