/**
 * Provision job
 *
 * For each device: validate it against the inventory, fetch its intended
 * configuration, then hand both to the deployment orchestrator.
 * Problems found before connecting come back as failed results, like
 * everything the orchestrator reports.
 */

import type {
  DeploymentFailure,
  DeploymentResult,
  DeviceTarget,
  FailureKind
} from './types.js'
import type { Inventory } from './inventory/inventory.js'
import type { ConfigSource } from './inventory/config-source.js'
import type { DeploymentOrchestrator } from './deploy/orchestrator.js'
import type { JobLogger } from './lib/logger.js'
import type { BatchOptions, BatchResult } from './lib/batch-runner.js'
import { getDevice, toDeviceTarget } from './inventory/inventory.js'
import { DiagnosticTrail, silentLogger } from './lib/logger.js'
import { runBatch } from './lib/batch-runner.js'
import {
  ConfigUnavailableError,
  DeviceNotFoundError,
  DeviceValidationError,
  errorMessage,
  isNetdeployError
} from './lib/errors.js'

export interface ProvisionContext {
  inventory: Inventory
  configSource: ConfigSource
  orchestrator: DeploymentOrchestrator
  logger?: JobLogger
}

export interface ProvisionOptions {
  /** Show the diff and discard (default true) */
  dryRun?: boolean
  /** Replace the whole configuration instead of merging (default false) */
  replace?: boolean
  /** Commit a non-empty diff when not a dry run (default true) */
  commitOnSuccess?: boolean
  signal?: AbortSignal
}

export type ProvisionBatchOptions = ProvisionOptions &
  Pick<BatchOptions<string, DeploymentResult>, 'concurrency' | 'stopOnError' | 'onProgress'>

/**
 * Whether a result should make the job fail
 */
export function isFailedResult(result: DeploymentResult): boolean {
  return result.status === 'failed' || result.status === 'rolled_back'
}

/**
 * Provision a single device by name
 *
 * @throws DeploymentCancelledError when `options.signal` aborts the attempt
 */
export async function provisionDevice(
  ctx: ProvisionContext,
  deviceName: string,
  options: ProvisionOptions = {}
): Promise<DeploymentResult> {
  const { dryRun = true, replace = false, commitOnSuccess = true, signal } = options
  const logger = ctx.logger ?? silentLogger
  const startedAt = new Date()
  const trail = new DiagnosticTrail(logger)

  trail.info(`Starting provisioning for device: ${deviceName}`)

  const prepared = (kind: FailureKind, err: unknown): DeploymentResult =>
    preparationFailure(deviceName, kind, err, { dryRun, replace, startedAt, trail })

  let target: DeviceTarget
  try {
    trail.info('Validating device configuration...')
    target = toDeviceTarget(ctx.inventory, getDevice(ctx.inventory, deviceName))
    trail.success('Device validation passed')
  } catch (err) {
    if (err instanceof DeviceValidationError || err instanceof DeviceNotFoundError) {
      trail.error(err.message)
      return prepared('invalid_device', err)
    }
    throw err
  }

  let candidateConfig: string
  try {
    candidateConfig = await ctx.configSource.getIntendedConfig(target, trail)
  } catch (err) {
    if (err instanceof ConfigUnavailableError) {
      trail.error('No intended configuration available. Cannot proceed.')
      return prepared('config_unavailable', err)
    }
    throw err
  }

  // the attempt's entries arrive scrubbed and are recorded after the preparation steps
  const result = await ctx.orchestrator.deploy(
    { target, candidateConfig, dryRun, replace, commitOnSuccess },
    { signal, logger: trail }
  )

  if (!isFailedResult(result)) {
    trail.success(`Provisioning completed for ${deviceName}`)
  }

  return Object.freeze({ ...result, trail: Object.freeze(trail.entries) })
}

/**
 * Provision several devices, at most `concurrency` at a time
 */
export function provisionDevices(
  ctx: ProvisionContext,
  deviceNames: string[],
  options: ProvisionBatchOptions = {}
): Promise<BatchResult<string, DeploymentResult>> {
  const { concurrency, stopOnError, onProgress, ...provision } = options

  return runBatch(
    deviceNames,
    name => provisionDevice(ctx, name, provision),
    {
      concurrency,
      stopOnError,
      onProgress,
      keyOf: name => name,
      failureOf: result => (isFailedResult(result) ? failureSummary(result) : undefined)
    }
  )
}

function failureSummary(result: DeploymentResult): string {
  if (result.error) {
    return `${result.status} (${result.error.kind}): ${result.error.message}`
  }
  return result.status
}

interface PreparationContext {
  dryRun: boolean
  replace: boolean
  startedAt: Date
  trail: DiagnosticTrail
}

function preparationFailure(
  device: string,
  kind: FailureKind,
  err: unknown,
  ctx: PreparationContext
): DeploymentResult {
  const error: DeploymentFailure = {
    kind,
    code: isNetdeployError(err) ? err.code : 'UNEXPECTED_ERROR',
    phase: 'prepare',
    message: errorMessage(err),
    suggestion: isNetdeployError(err) ? err.suggestion : undefined,
    retrySafe: true
  }

  const result: DeploymentResult = {
    target: device,
    status: 'failed',
    mode: ctx.replace ? 'replace' : 'merge',
    dryRun: ctx.dryRun,
    error: Object.freeze(error),
    states: ['idle', 'failed'],
    trail: ctx.trail.entries,
    startedAt: ctx.startedAt.toISOString(),
    durationMs: Date.now() - ctx.startedAt.getTime()
  }
  return Object.freeze(result)
}
