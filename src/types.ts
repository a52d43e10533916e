/**
 * netdeploy Type Definitions
 */

// ============================================================================
// Devices
// ============================================================================

/** Scalar transport option value (port, transport name, flags) */
export type DriverOptionValue = string | number | boolean

export type DriverOptions = Readonly<Record<string, DriverOptionValue>>

/**
 * Where a secret lives.
 *
 * - environment-variable: `parameters.variable` names the variable
 * - text-file: `parameters.path` names a file whose trimmed content is the secret
 */
export type SecretProvider = 'environment-variable' | 'text-file'

export type SecretAccessType = 'generic' | 'http' | 'ssh' | 'console'

export type SecretType = 'username' | 'password' | 'token' | 'secret'

export interface SecretDefinition {
  name: string
  provider: SecretProvider
  /** Provider parameters, may contain {{ device.<field> }} placeholders */
  parameters: Readonly<Record<string, string>>
}

export interface SecretAssignment {
  accessType: SecretAccessType
  secretType: SecretType
  secret: SecretDefinition
}

/** Named bundle of credential references */
export interface SecretsGroup {
  name: string
  assignments: readonly SecretAssignment[]
}

/**
 * The device a deployment attempt configures.
 * Never mutated while an attempt is running.
 */
export interface DeviceTarget {
  readonly name: string
  /** Management address (host or IP, no prefix length) */
  readonly address: string
  /** Transport driver identifier, e.g. "eos" */
  readonly driver: string
  readonly options: DriverOptions
  readonly secretsGroup?: SecretsGroup
}

// ============================================================================
// Credentials
// ============================================================================

export type CredentialSource = 'from_secret_store' | 'default'

export type CredentialFieldSource = 'secret_store' | 'default'

export interface Credentials {
  readonly username: string
  readonly password: string
  readonly provenance: CredentialSource
  readonly fields: {
    readonly username: CredentialFieldSource
    readonly password: CredentialFieldSource
  }
}

export interface DefaultCredentials {
  username: string
  password: string
}

// ============================================================================
// Deployment
// ============================================================================

export type StageMode = 'merge' | 'replace'

export interface DeploymentRequest {
  target: DeviceTarget
  candidateConfig: string
  dryRun: boolean
  replace: boolean
  commitOnSuccess: boolean
}

export type DeploymentStatus =
  | 'committed'
  | 'discarded'
  | 'dry_run_discarded'
  | 'no_op_no_diff'
  | 'rolled_back'
  | 'failed'
  | 'no_change_requested'

export type DeploymentState =
  | 'idle'
  | 'connecting'
  | 'staged'
  | 'diffed'
  | 'committing'
  | 'discarding'
  | 'closed'
  | 'failed'

/** Step of the workflow a failure happened in */
export type DeploymentPhase =
  | 'prepare'
  | 'connect'
  | 'stage'
  | 'diff'
  | 'commit'
  | 'discard'

export type FailureKind =
  | 'invalid_device'
  | 'config_unavailable'
  | 'unsupported_driver'
  | 'connection'
  | 'stage'
  | 'commit'
  | 'unexpected'

export interface DeploymentFailure {
  kind: FailureKind
  code: string
  phase: DeploymentPhase
  message: string
  suggestion?: string
  /** True when nothing was committed, or the device explicitly rolled back */
  retrySafe: boolean
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'success'

export interface DiagnosticEntry {
  level: LogLevel
  message: string
  at: string
}

/** Post-commit snapshot reported by the transport */
export type DeviceFacts = Readonly<Record<string, string | number>>

export interface DeploymentResult {
  readonly target: string
  readonly status: DeploymentStatus
  readonly mode: StageMode
  readonly dryRun: boolean
  readonly diffText?: string
  readonly error?: DeploymentFailure
  readonly facts?: DeviceFacts
  readonly credentialSource?: CredentialSource
  readonly states: readonly DeploymentState[]
  readonly trail: readonly DiagnosticEntry[]
  readonly startedAt: string
  readonly durationMs: number
}

// ============================================================================
// Configuration
// ============================================================================

export interface TimeoutConfig {
  open: number
  stage: number
  diff: number
  commit: number
  discard: number
  facts: number
  close: number
}

export interface NetdeployConfig {
  version: '1'
  /** Inventory file, relative to the config directory */
  inventory: string
  intended: {
    /** Directory of intended configs, relative to the config directory */
    dir: string
    /** File name pattern, {name} is the device name */
    filename: string
  }
  credentials: {
    default_username: string
    default_password: string
  }
  timeouts: TimeoutConfig
  concurrency: number
  verify_facts: boolean
}

// ============================================================================
// CLI
// ============================================================================

export interface CLIArgs {
  _: string[]
  live?: boolean
  replace?: boolean
  'skip-commit'?: boolean
  all?: boolean
  'stop-on-error'?: boolean
  concurrency?: number
  json?: boolean
  verbose?: boolean
  quiet?: boolean
  path?: string
}
