import type { TransportSession } from '../transport/types.js'

/**
 * Run `body` with an open session and release it on every exit path,
 * including rejections and cancellation.
 *
 * `release` must not throw; failures to close are the caller's to log.
 */
export async function usingSession<S extends TransportSession, T>(
  session: S,
  release: (session: S) => Promise<void>,
  body: (session: S) => Promise<T>
): Promise<T> {
  try {
    return await body(session)
  } finally {
    await release(session)
  }
}
