/**
 * Transport adapter contract
 *
 * One implementation per vendor family. Every native error an adapter sees is
 * mapped to the TransportError subclass of the operation that failed, so the
 * orchestrator never inspects vendor error types.
 */

import type {
  Credentials,
  DeviceFacts,
  DeviceTarget,
  DriverOptions,
  StageMode
} from '../types.js'

/**
 * Live connection handle. Owned by exactly one deployment attempt.
 */
export interface TransportSession {
  readonly id: string
  readonly target: DeviceTarget
}

export interface TransportAdapter<S extends TransportSession = TransportSession> {
  /** Driver identifier this adapter serves, e.g. "eos" */
  readonly driver: string

  /** @throws ConnectionFailure */
  open(target: DeviceTarget, credentials: Credentials, options: DriverOptions): Promise<S>

  /** Load candidate configuration. @throws StageFailure */
  stage(session: S, config: string, mode: StageMode): Promise<void>

  /** Pending change as text; empty when the candidate matches running state */
  diff(session: S): Promise<string>

  /** @throws CommitFailure (with `rolledBack` set only when the device confirmed it) */
  commit(session: S): Promise<void>

  /** Abandon the candidate. @throws DiscardFailure */
  discard(session: S): Promise<void>

  /** @throws FactsFailure */
  facts(session: S): Promise<DeviceFacts>

  /** Idempotent. @throws CloseFailure */
  close(session: S): Promise<void>
}

export type AdapterFactory = () => TransportAdapter
