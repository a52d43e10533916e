/**
 * Deployment Orchestrator
 *
 * Drives one device through a single deployment attempt:
 *
 *   idle → connecting → staged → diffed → committing | discarding → closed
 *
 * with `failed` reachable from any non-terminal state. Every outcome, the
 * failures included, comes back as a DeploymentResult; only cancellation
 * rejects, and it does so after cleanup.
 */

import type {
  CredentialSource,
  DeploymentFailure,
  DeploymentPhase,
  DeploymentRequest,
  DeploymentResult,
  DeploymentState,
  DeploymentStatus,
  DeviceFacts,
  FailureKind,
  StageMode,
  TimeoutConfig
} from '../types.js'
import type { TransportAdapter, TransportSession } from '../transport/types.js'
import type { DriverRegistry } from '../transport/registry.js'
import type { CredentialResolver } from '../credentials/resolver.js'
import type { JobLogger } from '../lib/logger.js'
import { DiagnosticTrail, silentLogger } from '../lib/logger.js'
import { withTimeout } from '../lib/timeout.js'
import { DEFAULT_CONFIG } from '../lib/config-loader.js'
import {
  CloseFailure,
  CommitFailure,
  ConnectionFailure,
  DeploymentCancelledError,
  DiscardFailure,
  DriverNotFoundError,
  FactsFailure,
  StageFailure,
  TransportTimeoutError,
  errorMessage,
  isNetdeployError,
  isTransportError
} from '../lib/errors.js'
import { decideAction } from './decision.js'
import { usingSession } from './session.js'

export interface OrchestratorOptions {
  drivers: DriverRegistry
  resolver: CredentialResolver
  /** Job-runner sink every attempt's trail forwards to */
  logger?: JobLogger
  timeouts?: Partial<TimeoutConfig>
  /** Read device facts after a successful commit (default true) */
  verifyFacts?: boolean
}

export interface DeployOptions {
  signal?: AbortSignal
  /** Overrides the orchestrator's sink for this attempt */
  logger?: JobLogger
}

interface AttemptContext {
  drivers: DriverRegistry
  resolver: CredentialResolver
  timeouts: TimeoutConfig
  verifyFacts: boolean
  sink: JobLogger
  signal?: AbortSignal
}

/** How an attempt ended, before the session is released */
interface Outcome {
  status: DeploymentStatus
  error?: DeploymentFailure
}

type TimedOperation = keyof TimeoutConfig

export class DeploymentOrchestrator {
  private readonly drivers: DriverRegistry
  private readonly resolver: CredentialResolver
  private readonly logger: JobLogger
  private readonly timeouts: TimeoutConfig
  private readonly verifyFacts: boolean

  constructor(options: OrchestratorOptions) {
    this.drivers = options.drivers
    this.resolver = options.resolver
    this.logger = options.logger ?? silentLogger
    this.timeouts = { ...DEFAULT_CONFIG.timeouts, ...options.timeouts }
    this.verifyFacts = options.verifyFacts ?? true
  }

  /**
   * Run one deployment attempt
   *
   * @throws DeploymentCancelledError when `options.signal` aborts the attempt
   */
  deploy(request: DeploymentRequest, options: DeployOptions = {}): Promise<DeploymentResult> {
    const attempt = new DeploymentAttempt(request, {
      drivers: this.drivers,
      resolver: this.resolver,
      timeouts: this.timeouts,
      verifyFacts: this.verifyFacts,
      sink: options.logger ?? this.logger,
      signal: options.signal
    })
    return attempt.run()
  }
}

// ============================================================================
// Attempt
// ============================================================================

/**
 * State of a single attempt. Not reusable.
 */
class DeploymentAttempt {
  private readonly request: DeploymentRequest
  private readonly ctx: AttemptContext
  private readonly trail: DiagnosticTrail
  private readonly states: DeploymentState[] = ['idle']
  private readonly startedAt = new Date()
  private readonly mode: StageMode

  private started = false
  private phase: DeploymentPhase = 'prepare'
  private commitAttempted = false
  private commitSucceeded = false
  private closeAttempted = false
  private credentialSource?: CredentialSource
  private diffText?: string
  private facts?: DeviceFacts

  constructor(request: DeploymentRequest, ctx: AttemptContext) {
    this.request = request
    this.ctx = ctx
    this.trail = new DiagnosticTrail(ctx.sink)
    this.mode = request.replace ? 'replace' : 'merge'
  }

  private get device(): string {
    return this.request.target.name
  }

  private get state(): DeploymentState {
    return this.states[this.states.length - 1]
  }

  async run(): Promise<DeploymentResult> {
    if (this.started) {
      throw new Error('A deployment attempt runs once')
    }
    this.started = true

    const { target, candidateConfig } = this.request
    this.trail.info(`Starting deployment to ${target.name}`)

    if (candidateConfig.trim() === '') {
      this.trail.warning(`Candidate configuration for ${target.name} is empty, nothing to deploy`)
      return this.result({ status: 'no_change_requested' })
    }

    let adapter: TransportAdapter
    try {
      adapter = this.ctx.drivers.get(target.driver)
    } catch (err) {
      return this.result(this.fail(err, 'unsupported_driver'))
    }

    this.throwIfCancelled()

    const credentials = await this.ctx.resolver.resolve(target, this.trail)
    if (credentials.password !== DEFAULT_CONFIG.credentials.default_password) {
      this.trail.redact(credentials.password)
    }
    this.credentialSource = credentials.provenance

    this.trail.info(`Device address: ${target.address}`)
    this.trail.info(`Driver: ${target.driver}`)
    this.trail.info(`Mode: ${this.request.dryRun ? 'DRY RUN' : 'LIVE DEPLOYMENT'}`)
    this.trail.info(`Method: ${this.mode === 'replace' ? 'REPLACE' : 'MERGE'}`)

    this.phase = 'connect'
    this.transition('connecting')
    this.trail.info(`Connecting to ${target.name} (${target.address})...`)

    this.throwIfCancelled()
    const opening = adapter.open(target, credentials, target.options)

    let session: TransportSession
    try {
      session = await this.timed(
        'open',
        () => opening,
        message => new ConnectionFailure(target.name, message)
      )
    } catch (err) {
      this.closeWhenOpened(adapter, opening)
      this.throwIfCancelled(err)
      return this.result(this.fail(err))
    }
    this.trail.success(`Connected to ${target.name}`)

    const outcome = await usingSession(
      session,
      opened => this.closeQuietly(adapter, opened),
      opened => this.drive(adapter, opened)
    )
    return this.result(outcome)
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async drive(adapter: TransportAdapter, session: TransportSession): Promise<Outcome> {
    try {
      this.phase = 'stage'
      if (this.mode === 'replace') {
        this.trail.warning('REPLACE mode: the entire configuration will be replaced')
      } else {
        this.trail.info('MERGE mode: configuration will be merged with the existing one')
      }

      try {
        await this.timed(
          'stage',
          () => adapter.stage(session, this.request.candidateConfig, this.mode),
          message => new StageFailure(this.device, message)
        )
      } catch (err) {
        this.throwIfCancelled(err)
        if (err instanceof StageFailure) {
          this.trail.error(`Configuration load error: ${err.message}`)
          await this.discardQuietly(adapter, session)
          return this.fail(err)
        }
        throw err
      }
      this.transition('staged')
      this.trail.success('Candidate configuration loaded')

      this.phase = 'diff'
      this.trail.info('Generating configuration diff...')
      const diffText = await this.timed(
        'diff',
        () => adapter.diff(session),
        () => new TransportTimeoutError(this.device, 'diff', this.ctx.timeouts.diff)
      )
      this.diffText = diffText
      this.transition('diffed')

      const action = decideAction({
        diffText,
        dryRun: this.request.dryRun,
        commitOnSuccess: this.request.commitOnSuccess
      })

      if (action !== 'no_op') {
        this.trail.info('Configuration changes:')
        this.trail.info(diffText)
      }

      switch (action) {
        case 'no_op':
          this.trail.info('No configuration changes detected, device already matches')
          await this.discardQuietly(adapter, session)
          return { status: 'no_op_no_diff' }

        case 'dry_run_discard':
          this.trail.warning('DRY RUN mode: discarding configuration changes')
          await this.discardQuietly(adapter, session)
          this.trail.info('To apply these changes, run again with dry run disabled')
          return { status: 'dry_run_discarded' }

        case 'discard':
          this.trail.warning('Commit disabled: changes were loaded but not committed')
          await this.discardQuietly(adapter, session)
          return { status: 'discarded' }

        case 'commit':
          return await this.commit(adapter, session)
      }
    } catch (err) {
      if (!this.commitSucceeded) {
        await this.discardQuietly(adapter, session)
      }
      this.throwIfCancelled(err)
      this.trail.error(`Unexpected error during deployment: ${errorMessage(err)}`)
      return this.fail(err)
    }
  }

  private async commit(adapter: TransportAdapter, session: TransportSession): Promise<Outcome> {
    this.phase = 'commit'
    this.transition('committing')
    this.trail.info('Committing configuration changes...')
    this.commitAttempted = true

    try {
      await this.timed(
        'commit',
        () => adapter.commit(session),
        message => new CommitFailure(this.device, message)
      )
    } catch (err) {
      this.throwIfCancelled(err)
      if (err instanceof CommitFailure) {
        this.trail.error(`Configuration deployment error: ${err.message}`)
        if (err.rolledBack) {
          this.trail.warning(`${this.device} reported that it restored its previous configuration`)
          return { ...this.fail(err), status: 'rolled_back' }
        }
        return this.fail(err)
      }
      throw err
    }

    this.commitSucceeded = true
    this.trail.success('Configuration committed successfully')

    if (this.ctx.verifyFacts) {
      await this.readFacts(adapter, session)
    }

    return { status: 'committed' }
  }

  private async readFacts(adapter: TransportAdapter, session: TransportSession): Promise<void> {
    this.trail.info('Verifying configuration...')
    try {
      const facts = await this.timed(
        'facts',
        () => adapter.facts(session),
        message => new FactsFailure(this.device, message)
      )
      this.facts = facts
      const hostname = facts.hostname ?? this.device
      this.trail.success(`Device ${hostname} is running with the new configuration`)
    } catch (err) {
      this.throwIfCancelled(err)
      this.trail.warning(`Could not verify configuration: ${errorMessage(err)}`)
    }
  }

  /**
   * Drop the candidate. Runs even after cancellation; never throws.
   */
  private async discardQuietly(adapter: TransportAdapter, session: TransportSession): Promise<void> {
    this.transition('discarding')
    this.trail.info('Discarding candidate configuration...')
    try {
      await this.timed(
        'discard',
        () => adapter.discard(session),
        message => new DiscardFailure(this.device, message),
        false
      )
    } catch (err) {
      this.trail.warning(`Could not discard candidate configuration: ${errorMessage(err)}`)
    }
  }

  /**
   * Release the session. Attempted once per opened session; never throws.
   */
  private async closeQuietly(adapter: TransportAdapter, session: TransportSession): Promise<void> {
    if (this.closeAttempted) return
    this.closeAttempted = true

    try {
      await this.timed(
        'close',
        () => adapter.close(session),
        message => new CloseFailure(this.device, message),
        false
      )
      this.trail.info('Connection closed')
    } catch (err) {
      this.trail.warning(`Error closing connection: ${errorMessage(err)}`)
    }

    if (this.state !== 'failed') {
      this.transition('closed')
    }
  }

  /**
   * A timed-out or cancelled open may still deliver a session; close it then.
   */
  private closeWhenOpened(adapter: TransportAdapter, opening: Promise<TransportSession>): void {
    opening.then(
      late => {
        this.trail.warning(`Connection to ${this.device} opened after the attempt ended, closing it`)
        return this.closeQuietly(adapter, late)
      },
      // the attempt already reported this rejection
      () => undefined
    )
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async timed<T>(
    operation: TimedOperation,
    call: () => Promise<T>,
    onTimeout: (message: string) => Error,
    cancellable: boolean = true
  ): Promise<T> {
    if (cancellable) this.throwIfCancelled()
    return withTimeout(call(), this.ctx.timeouts[operation], operation, {
      onTimeout,
      signal: cancellable ? this.ctx.signal : undefined
    })
  }

  private transition(next: DeploymentState): void {
    const previous = this.state
    if (previous === next) return
    this.states.push(next)
    this.trail.debug(`State: ${previous} -> ${next}`)
  }

  /**
   * Reject with DeploymentCancelledError once the caller's signal aborted
   */
  private throwIfCancelled(cause?: unknown): void {
    if (cause instanceof DeploymentCancelledError) throw cause
    const signal = this.ctx.signal
    if (signal?.aborted) {
      throw new DeploymentCancelledError(this.device, cause ?? signal.reason)
    }
  }

  private fail(err: unknown, kind: FailureKind = failureKind(err)): Outcome {
    this.transition('failed')

    const failure: DeploymentFailure = {
      kind,
      code: isNetdeployError(err) ? err.code : 'UNEXPECTED_ERROR',
      phase: this.phase,
      message: this.trail.scrub(errorMessage(err)),
      suggestion: isNetdeployError(err) ? err.suggestion : undefined,
      retrySafe: !this.commitAttempted || (err instanceof CommitFailure && err.rolledBack)
    }

    if (kind === 'connection') {
      this.trail.error(`Connection error: ${failure.message}`)
    } else if (kind === 'unsupported_driver') {
      this.trail.error(failure.message)
    }
    if (failure.suggestion) {
      this.trail.info(`Suggestion: ${failure.suggestion}`)
    }

    return { status: 'failed', error: failure }
  }

  private result(outcome: Outcome): DeploymentResult {
    const finished = Date.now()
    this.trail.info(`Deployment to ${this.device} finished: ${outcome.status}`)

    const result: DeploymentResult = {
      target: this.device,
      status: outcome.status,
      mode: this.mode,
      dryRun: this.request.dryRun,
      diffText: this.diffText,
      error: outcome.error ? Object.freeze({ ...outcome.error }) : undefined,
      facts: this.facts,
      credentialSource: this.credentialSource,
      states: Object.freeze([...this.states]),
      trail: Object.freeze(this.trail.entries),
      startedAt: this.startedAt.toISOString(),
      durationMs: finished - this.startedAt.getTime()
    }
    return Object.freeze(result)
  }
}

function failureKind(err: unknown): FailureKind {
  if (err instanceof DriverNotFoundError) return 'unsupported_driver'
  if (isTransportError(err)) {
    switch (err.kind) {
      case 'connection':
      case 'stage':
      case 'commit':
        return err.kind
      default:
        return 'unexpected'
    }
  }
  return 'unexpected'
}
