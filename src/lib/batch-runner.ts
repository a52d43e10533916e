/**
 * Batch Runner
 *
 * Execute an operation across many devices with bounded concurrency
 */

import pLimit from 'p-limit'

export interface BatchOperation<I, T> {
  item: I
  label: string
  result?: T
  /** The operation threw */
  error?: Error
  /** The operation resolved with a result that counts as a failure */
  failure?: string
  duration: number
}

export interface BatchResult<I, T> {
  total: number
  successful: number
  failed: number
  /** Never started because an earlier item failed under stopOnError */
  skipped: number
  /** Completed operations, in input order */
  operations: BatchOperation<I, T>[]
}

export type OperationFn<I, T> = (item: I, index: number) => Promise<T>

export interface BatchOptions<I, T> {
  concurrency?: number
  stopOnError?: boolean
  onProgress?: (completed: number, total: number, current: I) => void
  /** Display name of an item (default: String(item)) */
  label?: (item: I) => string
  /** Items with the same key never run at the same time */
  keyOf?: (item: I) => string
  /** Failure message for a resolved result, undefined when it succeeded */
  failureOf?: (result: T) => string | undefined
}

/**
 * Run an operation across multiple items
 */
export async function runBatch<I, T>(
  items: I[],
  operation: OperationFn<I, T>,
  options: BatchOptions<I, T> = {}
): Promise<BatchResult<I, T>> {
  const {
    concurrency = 1,
    stopOnError = false,
    onProgress,
    label = (item: I) => String(item),
    keyOf,
    failureOf
  } = options

  const slots: Array<BatchOperation<I, T> | undefined> = items.map(() => undefined)
  const tails = new Map<string, Promise<void>>()
  let completed = 0
  let successful = 0
  let failed = 0

  const runOperation = async (item: I, index: number): Promise<void> => {
    const startTime = Date.now()
    let entry: BatchOperation<I, T>

    try {
      const result = await operation(item, index)
      const failure = failureOf?.(result)
      entry = { item, label: label(item), result, failure, duration: Date.now() - startTime }
    } catch (err) {
      entry = {
        item,
        label: label(item),
        error: err instanceof Error ? err : new Error(String(err)),
        duration: Date.now() - startTime
      }
    }

    slots[index] = entry
    if (entry.error || entry.failure !== undefined) {
      failed++
    } else {
      successful++
    }

    completed++
    if (onProgress) {
      onProgress(completed, items.length, item)
    }
  }

  // Chain items sharing a key so they run one after another
  const serialized = (item: I, index: number): Promise<void> => {
    if (!keyOf) return runOperation(item, index)

    const key = keyOf(item)
    const previous = tails.get(key) ?? Promise.resolve()
    const current = previous.then(() => runOperation(item, index))
    tails.set(key, current)
    return current
  }

  if (concurrency <= 1) {
    for (let i = 0; i < items.length; i++) {
      await runOperation(items[i], i)
      if (stopOnError && failed > 0) {
        break
      }
    }
  } else {
    const limit = pLimit(concurrency)

    await Promise.all(
      items.map((item, index) =>
        limit(async () => {
          if (stopOnError && failed > 0) {
            return
          }
          await serialized(item, index)
        })
      )
    )
  }

  const operations = slots.filter((op): op is BatchOperation<I, T> => op !== undefined)

  return {
    total: items.length,
    successful,
    failed,
    skipped: items.length - operations.length,
    operations
  }
}

/**
 * Format batch result for display
 */
export function formatBatchResult<I, T>(
  result: BatchResult<I, T>,
  formatItem?: (op: BatchOperation<I, T>) => string
): string {
  const lines: string[] = []

  lines.push('')
  lines.push(`Batch Operation Summary:`)
  lines.push(`  Total:      ${result.total}`)
  lines.push(`  Successful: ${result.successful}`)
  lines.push(`  Failed:     ${result.failed}`)
  if (result.skipped > 0) {
    lines.push(`  Skipped:    ${result.skipped}`)
  }
  lines.push('')

  if (result.failed > 0) {
    lines.push('Failures:')
    for (const op of result.operations) {
      const reason = op.error?.message ?? op.failure
      if (reason !== undefined) {
        lines.push(`  ✗ ${op.label}: ${reason}`)
      }
    }
    lines.push('')
  }

  if (formatItem) {
    lines.push('Details:')
    for (const op of result.operations) {
      lines.push(`  ${formatItem(op)}`)
    }
  }

  return lines.join('\n')
}

/**
 * Format batch result as JSON
 */
export function formatBatchResultJson<I, T>(result: BatchResult<I, T>): object {
  return {
    total: result.total,
    successful: result.successful,
    failed: result.failed,
    skipped: result.skipped,
    operations: result.operations.map(op => ({
      item: op.label,
      success: !op.error && op.failure === undefined,
      error: op.error?.message ?? op.failure,
      duration: op.duration,
      result: op.result
    }))
  }
}
