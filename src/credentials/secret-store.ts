/**
 * Secret store
 *
 * Resolves a (group, access type, secret type) reference to a secret value.
 * The store knows two providers:
 *
 * - environment-variable: reads `parameters.variable` from the environment
 * - text-file: reads `parameters.path` and trims the content
 *
 * Parameters may reference the device being configured, e.g.
 * `NETDEPLOY_{{ device.name }}_PASSWORD`.
 */

import fs from 'node:fs'
import type {
  DeviceTarget,
  SecretAccessType,
  SecretDefinition,
  SecretsGroup,
  SecretType
} from '../types.js'
import { SecretNotFoundError, SecretProviderError, errorMessage } from '../lib/errors.js'

export interface SecretContext {
  device: DeviceTarget
}

export interface SecretStore {
  /**
   * Fetch one secret. Rejects with a SecretError (or anything else) when the
   * secret cannot be produced; may resolve to an empty string.
   */
  getSecret(
    group: SecretsGroup,
    accessType: SecretAccessType,
    secretType: SecretType,
    context: SecretContext
  ): Promise<string>
}

const PLACEHOLDER = /\{\{\s*device\.([a-zA-Z_]+)\s*\}\}/g

/**
 * Substitute {{ device.<field> }} placeholders with the device's scalar fields
 */
export function renderSecretParameter(template: string, context: SecretContext): string {
  const { device } = context
  const fields: Record<string, string> = {
    name: device.name,
    address: device.address,
    driver: device.driver
  }

  return template.replace(PLACEHOLDER, (match, field: string) => {
    const value = fields[field]
    if (value === undefined) {
      throw new SecretProviderError('template', `unknown placeholder ${match}`)
    }
    return value
  })
}

export interface ProviderSecretStoreOptions {
  env?: NodeJS.ProcessEnv
}

/**
 * Secret store backed by environment variables and text files
 */
export class ProviderSecretStore implements SecretStore {
  private readonly env: NodeJS.ProcessEnv

  constructor(options: ProviderSecretStoreOptions = {}) {
    this.env = options.env ?? process.env
  }

  async getSecret(
    group: SecretsGroup,
    accessType: SecretAccessType,
    secretType: SecretType,
    context: SecretContext
  ): Promise<string> {
    const assignment = group.assignments.find(
      a => a.accessType === accessType && a.secretType === secretType
    )

    if (!assignment) {
      throw new SecretNotFoundError(
        group.name,
        `no ${secretType} secret assigned for access type ${accessType}`
      )
    }

    return this.readSecret(group, assignment.secret, context)
  }

  private readSecret(group: SecretsGroup, secret: SecretDefinition, context: SecretContext): string {
    switch (secret.provider) {
      case 'environment-variable': {
        const variable = this.requireParameter(secret, 'variable', context)
        const value = this.env[variable]
        if (value === undefined) {
          throw new SecretNotFoundError(group.name, `environment variable ${variable} is not set`)
        }
        return value
      }

      case 'text-file': {
        const filePath = this.requireParameter(secret, 'path', context)
        try {
          return fs.readFileSync(filePath, 'utf-8').trim()
        } catch (err) {
          throw new SecretProviderError(secret.provider, `cannot read ${filePath}: ${errorMessage(err)}`, err)
        }
      }
    }
  }

  private requireParameter(secret: SecretDefinition, name: string, context: SecretContext): string {
    const template = secret.parameters[name]
    if (!template) {
      throw new SecretProviderError(secret.provider, `secret "${secret.name}" has no "${name}" parameter`)
    }
    return renderSecretParameter(template, context)
  }
}
