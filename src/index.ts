/**
 * netdeploy - Push intended configurations to network devices
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  CredentialFieldSource,
  CredentialSource,
  Credentials,
  DefaultCredentials,
  DeploymentFailure,
  DeploymentPhase,
  DeploymentRequest,
  DeploymentResult,
  DeploymentState,
  DeploymentStatus,
  DeviceFacts,
  DeviceTarget,
  DiagnosticEntry,
  DriverOptions,
  DriverOptionValue,
  FailureKind,
  LogLevel,
  NetdeployConfig,
  SecretAccessType,
  SecretAssignment,
  SecretDefinition,
  SecretProvider,
  SecretsGroup,
  SecretType,
  StageMode,
  TimeoutConfig
} from './types.js'

// Deployment
export { DeploymentOrchestrator } from './deploy/orchestrator.js'
export type { OrchestratorOptions, DeployOptions } from './deploy/orchestrator.js'
export { decideAction } from './deploy/decision.js'
export type { DeploymentAction, DecisionInput } from './deploy/decision.js'
export { usingSession } from './deploy/session.js'

// Credentials
export { CredentialResolver } from './credentials/resolver.js'
export type { CredentialResolverOptions } from './credentials/resolver.js'
export { ProviderSecretStore, renderSecretParameter } from './credentials/secret-store.js'
export type { SecretStore, SecretContext, ProviderSecretStoreOptions } from './credentials/secret-store.js'

// Transport
export type { TransportAdapter, TransportSession, AdapterFactory } from './transport/types.js'
export { DriverRegistry, createDriverRegistry } from './transport/registry.js'
export { EosEapiAdapter, EapiCommandError } from './transport/eos.js'
export type { EosSession, EosAdapterOptions } from './transport/eos.js'

// Inventory and intended configuration
export {
  loadInventory,
  parseInventory,
  listDevices,
  getDevice,
  toDeviceTarget
} from './inventory/inventory.js'
export type { Inventory, InventoryDevice, InventoryPlatform } from './inventory/inventory.js'
export { FileConfigSource } from './inventory/config-source.js'
export type { ConfigSource, FileConfigSourceOptions } from './inventory/config-source.js'

// Provision job
export { provisionDevice, provisionDevices, isFailedResult } from './provision.js'
export type { ProvisionContext, ProvisionOptions, ProvisionBatchOptions } from './provision.js'
export { runBatch, formatBatchResult, formatBatchResultJson } from './lib/batch-runner.js'
export type { BatchResult, BatchOperation, BatchOptions } from './lib/batch-runner.js'

// Config utilities
export {
  loadConfig,
  findConfigDir,
  normalizeConfig,
  expandEnvVars,
  DEFAULT_CONFIG
} from './lib/config-loader.js'

// Logging
export { createConsoleLogger, silentLogger, DiagnosticTrail } from './lib/logger.js'
export type { JobLogger, ConsoleLoggerOptions } from './lib/logger.js'

// Errors
export {
  NetdeployError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  InventoryError,
  InvalidInventoryError,
  DeviceNotFoundError,
  DeviceValidationError,
  SecretError,
  SecretNotFoundError,
  SecretProviderError,
  CredentialUnavailableError,
  ConfigUnavailableError,
  DriverNotFoundError,
  DeploymentCancelledError,
  TransportError,
  ConnectionFailure,
  StageFailure,
  CommitFailure,
  DiscardFailure,
  FactsFailure,
  CloseFailure,
  TransportTimeoutError,
  isNetdeployError,
  isTransportError,
  formatErrorForCli
} from './lib/errors.js'
