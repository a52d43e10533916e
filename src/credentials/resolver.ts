/**
 * Credential Resolver
 *
 * Produces a username/password pair for a device. Each field is looked up in
 * the device's secrets group on its own and falls back to the configured
 * default when the store cannot produce it. Resolution never fails.
 */

import type {
  CredentialFieldSource,
  Credentials,
  DefaultCredentials,
  DeviceTarget,
  SecretsGroup
} from '../types.js'
import type { SecretStore } from './secret-store.js'
import type { JobLogger } from '../lib/logger.js'
import { silentLogger } from '../lib/logger.js'
import { CredentialUnavailableError, errorMessage } from '../lib/errors.js'
import { describeCredentials } from '../lib/masking.js'

type CredentialField = 'username' | 'password'

export interface CredentialResolverOptions {
  /** Secret store consulted for devices with a secrets group */
  store?: SecretStore
  /** Fallback pair for fields the store cannot produce */
  defaults: DefaultCredentials
  logger?: JobLogger
}

interface FieldResolution {
  value: string
  source: CredentialFieldSource
}

export class CredentialResolver {
  private readonly store?: SecretStore
  private readonly defaults: DefaultCredentials
  private readonly logger: JobLogger

  constructor(options: CredentialResolverOptions) {
    this.store = options.store
    this.defaults = { ...options.defaults }
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Resolve credentials for a device
   *
   * @param logger - per-attempt logger, overrides the resolver's own
   */
  async resolve(target: DeviceTarget, logger: JobLogger = this.logger): Promise<Credentials> {
    const group = target.secretsGroup

    if (!group || !this.store) {
      if (group) {
        logger.warning(
          `Secrets group '${group.name}' is configured for ${target.name} but no secret store is available. ` +
          `Using default credentials (username: ${this.defaults.username})`
        )
      } else {
        logger.info(
          `No secrets group configured for ${target.name}. ` +
          `Using default credentials (username: ${this.defaults.username})`
        )
        logger.info('Tip: assign a secrets group to the device for production use')
      }
      return this.build(
        { value: this.defaults.username, source: 'default' },
        { value: this.defaults.password, source: 'default' }
      )
    }

    logger.info(`Secrets group configured: ${group.name}`)

    const username = await this.resolveField(this.store, group, target, 'username', logger)
    const password = await this.resolveField(this.store, group, target, 'password', logger)
    const credentials = this.build(username, password)

    if (credentials.provenance === 'from_secret_store') {
      logger.success(`Using credentials from secrets group: ${group.name}`)
      logger.info(`Using credentials: ${describeCredentials(credentials)}`)
    } else {
      logger.warning(
        `Secrets group '${group.name}' is configured but secrets could not be retrieved. ` +
        `Using default credentials (username: ${this.defaults.username})`
      )
    }

    return credentials
  }

  private async resolveField(
    store: SecretStore,
    group: SecretsGroup,
    target: DeviceTarget,
    field: CredentialField,
    logger: JobLogger
  ): Promise<FieldResolution> {
    const fallback: FieldResolution = { value: this.defaults[field], source: 'default' }

    let value: string
    try {
      value = await store.getSecret(group, 'generic', field, { device: target })
    } catch (err) {
      const unavailable = new CredentialUnavailableError(field, errorMessage(err), err)
      const errorName = err instanceof Error ? err.name : typeof err
      logger.debug(`${unavailable.message} (${errorName})`)
      logger.info(`Could not retrieve ${field} from secrets, using default`)
      return fallback
    }

    if (value === '') {
      logger.info(`${capitalize(field)} secret returned empty, using default`)
      return fallback
    }

    logger.success(
      field === 'username'
        ? `Retrieved username from secrets group: ${value}`
        : 'Retrieved password from secrets group'
    )
    return { value, source: 'secret_store' }
  }

  private build(username: FieldResolution, password: FieldResolution): Credentials {
    const fromStore = username.source === 'secret_store' || password.source === 'secret_store'
    return {
      username: username.value,
      password: password.value,
      provenance: fromStore ? 'from_secret_store' : 'default',
      fields: {
        username: username.source,
        password: password.source
      }
    }
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}
