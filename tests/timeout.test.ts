/**
 * Timeout utilities tests
 */

import { describe, it, expect } from 'vitest'
import { withTimeout } from '../src/lib/timeout.js'

class SlowDeviceError extends Error {}

describe('withTimeout', () => {
  it('should resolve when promise completes before timeout', async () => {
    const fastPromise = new Promise<string>((resolve) => {
      setTimeout(() => resolve('success'), 10)
    })

    const result = await withTimeout(fastPromise, 1000, 'fast operation')
    expect(result).toBe('success')
  })

  it('should reject when promise exceeds timeout', async () => {
    const slowPromise = new Promise<string>((resolve) => {
      setTimeout(() => resolve('too late'), 500)
    })

    await expect(
      withTimeout(slowPromise, 20, 'slow operation')
    ).rejects.toThrow('Operation timed out after 20ms: slow operation')
  })

  it('should reject with original error when promise fails before timeout', async () => {
    const failingPromise = Promise.reject(new Error('original error'))

    await expect(
      withTimeout(failingPromise, 1000, 'failing operation')
    ).rejects.toThrow('original error')
  })

  it('should build the timeout error with onTimeout', async () => {
    const hanging = new Promise<never>(() => {})

    const attempt = withTimeout(hanging, 10, 'commit', {
      onTimeout: message => new SlowDeviceError(`leaf1: ${message}`)
    })

    await expect(attempt).rejects.toBeInstanceOf(SlowDeviceError)
    await expect(attempt).rejects.toThrow('leaf1: Operation timed out after 10ms: commit')
  })

  it('should not arm a timer when the timeout is zero', async () => {
    const delayed = new Promise<string>((resolve) => {
      setTimeout(() => resolve('done'), 20)
    })

    await expect(withTimeout(delayed, 0, 'open')).resolves.toBe('done')
  })

  it('should reject with the abort reason when the signal aborts', async () => {
    const controller = new AbortController()
    const hanging = new Promise<never>(() => {})

    const attempt = withTimeout(hanging, 1000, 'stage', { signal: controller.signal })
    controller.abort(new Error('operator cancelled'))

    await expect(attempt).rejects.toThrow('operator cancelled')
  })

  it('should reject at once for an already aborted signal', async () => {
    const controller = new AbortController()
    controller.abort('not an error')

    await expect(
      withTimeout(new Promise<never>(() => {}), 1000, 'diff', { signal: controller.signal })
    ).rejects.toThrow('Operation aborted')
  })
})
