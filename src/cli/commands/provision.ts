/**
 * netdeploy CLI - Provision and Diff Commands
 *
 *   netdeploy provision leaf1,leaf2          dry run (diff, then discard)
 *   netdeploy provision leaf1 --live         commit the intended config
 *   netdeploy diff --all                     dry run on every device
 */

import type { DeploymentResult } from '../../types.js'
import type { CommandContext } from '../context.js'
import type { BatchOperation, BatchResult } from '../../lib/batch-runner.js'
import type { ProvisionContext } from '../../provision.js'
import { provisionDevices } from '../../provision.js'
import { listDevices } from '../../inventory/inventory.js'
import { formatBatchResult, formatBatchResultJson } from '../../lib/batch-runner.js'
import { NetdeployError } from '../../lib/errors.js'
import { createProvisionContext } from '../lib/create-job.js'
import { parseDeviceList } from '../args.js'
import { c, colorDiff, colorStatus, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface ProvisionCommandOptions {
  /** Ignore --live and --skip-commit (the diff command) */
  forceDryRun?: boolean
  /** Prebuilt job, otherwise built from the context's config */
  job?: ProvisionContext
}

/**
 * Run provision (or diff) and return the process exit code
 */
export async function runProvision(
  context: CommandContext,
  options: ProvisionCommandOptions = {}
): Promise<number> {
  const { args, config, jsonOutput } = context
  const job = options.job ?? createProvisionContext({
    config,
    configDir: context.configDir,
    logger: context.logger
  })

  const devices = args.all
    ? listDevices(job.inventory)
    : parseDeviceList(args._.slice(1))

  if (devices.length === 0) {
    throw new NetdeployError('No devices given', 'NO_DEVICES', {
      suggestion: `Pass device names (comma-separated) or ${c.command('--all')}`
    })
  }

  const dryRun = options.forceDryRun === true || args.live !== true
  const replace = args.replace === true
  const commitOnSuccess = options.forceDryRun === true || args['skip-commit'] !== true

  if (!dryRun) {
    context.logger.warning(
      `LIVE deployment to ${devices.length} device(s)${replace ? ' in REPLACE mode' : ''}`
    )
  }

  const controller = new AbortController()
  const onInterrupt = () => controller.abort(new Error('Interrupted'))
  process.once('SIGINT', onInterrupt)

  let batch: BatchResult<string, DeploymentResult>
  try {
    batch = await provisionDevices(job, devices, {
      dryRun,
      replace,
      commitOnSuccess,
      signal: controller.signal,
      concurrency: args.concurrency ?? config.concurrency,
      stopOnError: args['stop-on-error'] === true,
      onProgress: (completed, total, device) => {
        context.logger.debug(`[${completed}/${total}] ${device} done`)
      }
    })
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }

  if (jsonOutput) {
    ui.output(JSON.stringify(formatBatchResultJson(batch), null, 2))
  } else {
    for (const op of batch.operations) {
      ui.output(formatOperation(op))
    }
    if (batch.total > 1 || batch.failed > 0) {
      ui.log(formatBatchResult(batch))
    }
  }

  return batch.failed > 0 ? 1 : 0
}

/**
 * One device's outcome for the terminal
 */
export function formatOperation(op: BatchOperation<string, DeploymentResult>): string {
  if (op.error || !op.result) {
    return `${symbols.error} ${c.device(op.label)}: ${c.error(op.error?.message ?? 'no result')}`
  }

  const result = op.result
  const symbol = op.failure !== undefined ? symbols.error : symbols.success
  const seconds = (result.durationMs / 1000).toFixed(1)
  const lines = [
    `${symbol} ${c.device(result.target)} ${colorStatus(result.status)} ${c.muted(`(${result.mode}, ${seconds}s)`)}`
  ]

  if (result.error) {
    lines.push(`  ${c.error(result.error.message)}`)
    if (result.error.suggestion) {
      lines.push(`  ${c.label('Suggestion:')} ${result.error.suggestion}`)
    }
  }

  if (result.diffText) {
    lines.push(
      colorDiff(result.diffText)
        .split('\n')
        .map(line => `    ${line}`)
        .join('\n')
    )
  }

  return lines.join('\n')
}
