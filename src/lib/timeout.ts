/**
 * Timeout utilities for device transport calls
 *
 * Every transport call is a blocking network round-trip; none may hang an attempt forever.
 */

export interface TimeoutOptions {
  /** Builds the rejection for an expired timer (default: a plain Error) */
  onTimeout?: (message: string) => Error
  /** Rejects early with the signal's reason once it aborts */
  signal?: AbortSignal
}

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds (0 or less disables the timer)
 * @param operation - Operation name for error message
 * @returns Promise that rejects if timeout is reached
 *
 * @example
 * ```ts
 * const session = await withTimeout(
 *   adapter.open(target, credentials, target.options),
 *   30000,
 *   'open',
 *   { onTimeout: message => new ConnectionFailure(target.name, message) }
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  options: TimeoutOptions = {}
): Promise<T> {
  const { onTimeout, signal } = options
  let timeoutHandle: NodeJS.Timeout | undefined
  let removeAbortListener: (() => void) | undefined

  const guards: Promise<never>[] = []

  if (timeoutMs > 0) {
    guards.push(new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        const message = `Operation timed out after ${timeoutMs}ms: ${operation}`
        reject(onTimeout ? onTimeout(message) : new Error(message))
      }, timeoutMs)
    }))
  }

  if (signal) {
    guards.push(new Promise<never>((_, reject) => {
      if (signal.aborted) {
        reject(abortReason(signal))
        return
      }
      const listener = () => reject(abortReason(signal))
      signal.addEventListener('abort', listener, { once: true })
      removeAbortListener = () => signal.removeEventListener('abort', listener)
    }))
  }

  try {
    return await Promise.race([promise, ...guards])
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle)
    if (removeAbortListener) removeAbortListener()
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  return reason instanceof Error ? reason : new Error('Operation aborted')
}
