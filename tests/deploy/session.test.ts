import { describe, it, expect, vi } from 'vitest'
import { usingSession } from '../../src/deploy/session.js'
import type { TransportSession } from '../../src/transport/types.js'
import { makeTarget } from '../helpers/fake-transport.js'

const session: TransportSession = { id: 'leaf1#1', target: makeTarget() }

describe('usingSession', () => {
  it('should release after the body resolves and return its value', async () => {
    const order: string[] = []
    const release = vi.fn(async () => { order.push('release') })

    const value = await usingSession(session, release, async opened => {
      order.push(`body ${opened.id}`)
      return 42
    })

    expect(value).toBe(42)
    expect(order).toEqual(['body leaf1#1', 'release'])
    expect(release).toHaveBeenCalledTimes(1)
    expect(release).toHaveBeenCalledWith(session)
  })

  it('should release and rethrow when the body rejects', async () => {
    const release = vi.fn(async () => {})

    await expect(
      usingSession(session, release, async () => {
        throw new Error('stage exploded')
      })
    ).rejects.toThrow('stage exploded')

    expect(release).toHaveBeenCalledTimes(1)
  })
})
