/**
 * netdeploy Error Hierarchy
 *
 * Typed error classes shared by the CLI, the provision job and library callers.
 *
 * Hierarchy:
 *   NetdeployError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── InventoryError (device inventory)
 *   │   ├── InvalidInventoryError
 *   │   ├── DeviceNotFoundError
 *   │   └── DeviceValidationError
 *   ├── SecretError (secret providers)
 *   │   ├── SecretNotFoundError
 *   │   └── SecretProviderError
 *   ├── CredentialUnavailableError
 *   ├── ConfigUnavailableError
 *   ├── DriverNotFoundError
 *   ├── DeploymentCancelledError
 *   └── TransportError (device transport, one class per failure kind)
 *       ├── ConnectionFailure
 *       ├── StageFailure
 *       ├── CommitFailure
 *       ├── DiscardFailure
 *       ├── FactsFailure
 *       ├── CloseFailure
 *       └── TransportTimeoutError
 */

interface NetdeployErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all netdeploy errors
 */
export class NetdeployError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: NetdeployErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'NetdeployError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends NetdeployError {
  constructor(message: string, code: string, options?: NetdeployErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .netdeploy/config.yaml is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedFrom?: string) {
    super(
      searchedFrom
        ? `No .netdeploy/config.yaml found from ${searchedFrom}`
        : 'No .netdeploy/config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create .netdeploy/config.yaml or pass --path to the project directory',
        context: searchedFrom ? { searchedFrom } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .netdeploy/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Inventory Errors
// =============================================================================

export class InventoryError extends NetdeployError {
  constructor(message: string, code: string, options?: NetdeployErrorOptions) {
    super(message, code, options)
    this.name = 'InventoryError'
  }
}

/**
 * Thrown when inventory.yaml cannot be read or has the wrong shape
 */
export class InvalidInventoryError extends InventoryError {
  constructor(message: string, inventoryPath?: string, cause?: unknown) {
    super(
      inventoryPath ? `Invalid inventory in ${inventoryPath}: ${message}` : `Invalid inventory: ${message}`,
      'INVALID_INVENTORY',
      {
        suggestion: 'Check the devices, platforms and secrets_groups sections of your inventory',
        context: inventoryPath ? { inventoryPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidInventoryError'
  }
}

export class DeviceNotFoundError extends InventoryError {
  constructor(device: string, available: string[]) {
    super(
      `Device "${device}" not found in inventory`,
      'DEVICE_NOT_FOUND',
      {
        suggestion: available.length > 0
          ? `Known devices: ${available.join(', ')}`
          : 'The inventory has no devices',
        context: { device, available }
      }
    )
    this.name = 'DeviceNotFoundError'
  }
}

/**
 * Thrown when a device lacks what a deployment needs (platform, driver, address)
 */
export class DeviceValidationError extends InventoryError {
  readonly device: string

  constructor(device: string, problem: string, suggestion: string) {
    super(
      `Device ${device} ${problem}`,
      'INVALID_DEVICE',
      {
        suggestion,
        context: { device, problem }
      }
    )
    this.name = 'DeviceValidationError'
    this.device = device
  }
}

// =============================================================================
// Secret and Credential Errors
// =============================================================================

export class SecretError extends NetdeployError {
  constructor(message: string, code: string, options?: NetdeployErrorOptions) {
    super(message, code, options)
    this.name = 'SecretError'
  }
}

/**
 * Thrown when a secrets group has no matching assignment or the source is empty
 */
export class SecretNotFoundError extends SecretError {
  constructor(group: string, detail: string) {
    super(
      `Secret not found in group "${group}": ${detail}`,
      'SECRET_NOT_FOUND',
      { context: { group, detail } }
    )
    this.name = 'SecretNotFoundError'
  }
}

/**
 * Thrown when a provider fails while reading a secret
 */
export class SecretProviderError extends SecretError {
  constructor(provider: string, detail: string, cause?: unknown) {
    super(
      `Secret provider "${provider}" failed: ${detail}`,
      'SECRET_PROVIDER_ERROR',
      { context: { provider }, cause }
    )
    this.name = 'SecretProviderError'
  }
}

/**
 * A credential field could not be read from the secret store.
 * Recovered by the resolver, never surfaced as a deployment failure.
 */
export class CredentialUnavailableError extends NetdeployError {
  readonly field: 'username' | 'password'

  constructor(field: 'username' | 'password', reason: string, cause?: unknown) {
    super(
      `Could not retrieve ${field} from secrets: ${reason}`,
      'CREDENTIAL_UNAVAILABLE',
      { context: { field }, cause }
    )
    this.name = 'CredentialUnavailableError'
    this.field = field
  }
}

/**
 * The configuration-intent store has nothing usable for a device
 */
export class ConfigUnavailableError extends NetdeployError {
  constructor(device: string, reason: string) {
    super(
      `No intended configuration available for ${device}: ${reason}`,
      'CONFIG_UNAVAILABLE',
      {
        suggestion: 'Generate the intended configuration for this device before provisioning',
        context: { device }
      }
    )
    this.name = 'ConfigUnavailableError'
  }
}

export class DriverNotFoundError extends NetdeployError {
  constructor(driver: string, available: string[]) {
    super(
      `No transport driver registered for "${driver}"`,
      'DRIVER_NOT_FOUND',
      {
        suggestion: `Available drivers: ${available.join(', ')}`,
        context: { driver, available }
      }
    )
    this.name = 'DriverNotFoundError'
  }
}

/**
 * The caller aborted an attempt; cleanup already ran when this is thrown
 */
export class DeploymentCancelledError extends NetdeployError {
  constructor(device: string, reason?: unknown) {
    super(
      `Deployment to ${device} was cancelled`,
      'DEPLOYMENT_CANCELLED',
      { context: { device }, cause: reason }
    )
    this.name = 'DeploymentCancelledError'
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

export type TransportFailureKind =
  | 'connection'
  | 'stage'
  | 'commit'
  | 'discard'
  | 'facts'
  | 'close'
  | 'timeout'

/**
 * Base class for everything a transport adapter may throw.
 * Adapters map their native errors into one of the subclasses.
 */
export class TransportError extends NetdeployError {
  readonly kind: TransportFailureKind

  constructor(
    kind: TransportFailureKind,
    message: string,
    code: string,
    options?: NetdeployErrorOptions
  ) {
    super(message, code, options)
    this.name = 'TransportError'
    this.kind = kind
  }
}

export class ConnectionFailure extends TransportError {
  constructor(device: string, reason: string, cause?: unknown) {
    super('connection', `Connection to ${device} failed: ${reason}`, 'CONNECTION_FAILURE', {
      suggestion: 'Verify the device is reachable, credentials are correct, the management interface is configured and the API is enabled',
      context: { device },
      cause
    })
    this.name = 'ConnectionFailure'
  }
}

export class StageFailure extends TransportError {
  constructor(device: string, reason: string, cause?: unknown) {
    super('stage', `Loading candidate configuration on ${device} failed: ${reason}`, 'STAGE_FAILURE', {
      suggestion: 'Check the intended configuration for syntax the device rejects',
      context: { device },
      cause
    })
    this.name = 'StageFailure'
  }
}

export class CommitFailure extends TransportError {
  /** Set only when the device confirmed it restored the previous configuration */
  readonly rolledBack: boolean

  constructor(device: string, reason: string, options: { rolledBack?: boolean; cause?: unknown } = {}) {
    super('commit', `Commit on ${device} failed: ${reason}`, 'COMMIT_FAILURE', {
      suggestion: options.rolledBack
        ? 'The device restored its previous configuration; fix the candidate and retry'
        : 'Inspect the running configuration on the device before retrying',
      context: { device, rolledBack: options.rolledBack ?? false },
      cause: options.cause
    })
    this.name = 'CommitFailure'
    this.rolledBack = options.rolledBack ?? false
  }
}

export class DiscardFailure extends TransportError {
  constructor(device: string, reason: string, cause?: unknown) {
    super('discard', `Discarding candidate on ${device} failed: ${reason}`, 'DISCARD_FAILURE', {
      context: { device },
      cause
    })
    this.name = 'DiscardFailure'
  }
}

export class FactsFailure extends TransportError {
  constructor(device: string, reason: string, cause?: unknown) {
    super('facts', `Reading facts from ${device} failed: ${reason}`, 'FACTS_FAILURE', {
      context: { device },
      cause
    })
    this.name = 'FactsFailure'
  }
}

export class CloseFailure extends TransportError {
  constructor(device: string, reason: string, cause?: unknown) {
    super('close', `Closing connection to ${device} failed: ${reason}`, 'CLOSE_FAILURE', {
      context: { device },
      cause
    })
    this.name = 'CloseFailure'
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(device: string, operation: string, timeoutMs: number) {
    super('timeout', `Operation timed out after ${timeoutMs}ms: ${operation} on ${device}`, 'TRANSPORT_TIMEOUT', {
      suggestion: 'Raise the matching timeouts entry in .netdeploy/config.yaml if the device is slow',
      context: { device, operation, timeoutMs }
    })
    this.name = 'TransportTimeoutError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isNetdeployError(error: unknown): error is NetdeployError {
  return error instanceof NetdeployError
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isNetdeployError(error)) {
    return error.toCliOutput()
  }
  return `Error: ${errorMessage(error)}`
}

/**
 * Wrap a generic error into a NetdeployError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): NetdeployError {
  if (isNetdeployError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new NetdeployError(error.message, defaultCode, { cause: error })
  }
  return new NetdeployError(String(error), defaultCode)
}
