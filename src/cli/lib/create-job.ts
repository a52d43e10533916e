/**
 * Wires a loaded configuration into a ready-to-run provision job
 */

import type { NetdeployConfig } from '../../types.js'
import type { JobLogger } from '../../lib/logger.js'
import type { ProvisionContext } from '../../provision.js'
import type { DriverRegistry } from '../../transport/registry.js'
import type { SecretStore } from '../../credentials/secret-store.js'
import { loadInventory } from '../../inventory/inventory.js'
import { FileConfigSource } from '../../inventory/config-source.js'
import { ProviderSecretStore } from '../../credentials/secret-store.js'
import { CredentialResolver } from '../../credentials/resolver.js'
import { DeploymentOrchestrator } from '../../deploy/orchestrator.js'
import { createDriverRegistry } from '../../transport/registry.js'
import { resolveConfigPath } from '../../lib/config-loader.js'

export interface CreateJobOptions {
  config: NetdeployConfig
  /** The .netdeploy directory; relative paths in the config resolve from it */
  configDir: string
  logger: JobLogger
  /** Defaults to the built-in drivers */
  drivers?: DriverRegistry
  /** Defaults to the environment-variable and text-file providers */
  secrets?: SecretStore
}

export function createProvisionContext(options: CreateJobOptions): ProvisionContext {
  const { config, configDir, logger } = options

  const inventory = loadInventory(resolveConfigPath(configDir, config.inventory))

  const configSource = new FileConfigSource({
    dir: resolveConfigPath(configDir, config.intended.dir),
    filename: config.intended.filename,
    logger
  })

  const resolver = new CredentialResolver({
    store: options.secrets ?? new ProviderSecretStore(),
    defaults: {
      username: config.credentials.default_username,
      password: config.credentials.default_password
    },
    logger
  })

  const orchestrator = new DeploymentOrchestrator({
    drivers: options.drivers ?? createDriverRegistry(),
    resolver,
    logger,
    timeouts: config.timeouts,
    verifyFacts: config.verify_facts
  })

  return { inventory, configSource, orchestrator, logger }
}
