/**
 * Device inventory
 *
 * inventory.yaml describes what the deployment workflow needs to reach a
 * device: its management address, its platform (driver and driver options)
 * and the secrets group holding its credentials.
 *
 * ```yaml
 * secrets_groups:
 *   lab:
 *     - access_type: generic
 *       secret_type: username
 *       provider: environment-variable
 *       parameters: { variable: LAB_USERNAME }
 *
 * platforms:
 *   arista_eos:
 *     driver: eos
 *     driver_options: { transport: https }
 *
 * devices:
 *   leaf1:
 *     address: 10.0.0.11/24
 *     platform: arista_eos
 *     secrets_group: lab
 * ```
 */

import fs from 'node:fs'
import { parse as parseYaml } from 'yaml'
import type {
  DeviceTarget,
  DriverOptionValue,
  SecretAccessType,
  SecretAssignment,
  SecretProvider,
  SecretsGroup,
  SecretType
} from '../types.js'
import {
  DeviceNotFoundError,
  DeviceValidationError,
  InvalidInventoryError,
  errorMessage
} from '../lib/errors.js'
import { isPlainObject, isScalar, type PlainObject } from '../lib/values.js'

export interface InventoryPlatform {
  name: string
  driver?: string
  driverOptions: Record<string, DriverOptionValue>
}

export interface InventoryDevice {
  name: string
  /** Primary management address, possibly with a prefix length */
  address?: string
  platform?: string
  secretsGroup?: string
}

export interface Inventory {
  /** File the inventory was read from, when it came from disk */
  source?: string
  devices: Map<string, InventoryDevice>
  platforms: Map<string, InventoryPlatform>
  secretsGroups: Map<string, SecretsGroup>
}

const PROVIDERS: readonly SecretProvider[] = ['environment-variable', 'text-file']
const ACCESS_TYPES: readonly SecretAccessType[] = ['generic', 'http', 'ssh', 'console']
const SECRET_TYPES: readonly SecretType[] = ['username', 'password', 'token', 'secret']

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find(item => item === value)
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Build an Inventory from parsed YAML
 */
export function parseInventory(raw: unknown, source?: string): Inventory {
  const fail = (message: string): never => {
    throw new InvalidInventoryError(message, source)
  }

  const doc = raw ?? {}
  const root: PlainObject = isPlainObject(doc) ? doc : fail('top level must be a mapping')

  const section = (key: string): PlainObject => {
    const value = root[key]
    if (value === undefined || value === null) return {}
    return isPlainObject(value) ? value : fail(`"${key}" must be a mapping`)
  }

  const optionalString = (value: unknown, field: string): string | undefined => {
    if (value === undefined || value === null || value === '') return undefined
    return typeof value === 'string' ? value : fail(`"${field}" must be a string`)
  }

  const secretsGroups = new Map<string, SecretsGroup>()
  for (const [groupName, entries] of Object.entries(section('secrets_groups'))) {
    const list: unknown[] = Array.isArray(entries)
      ? entries
      : fail(`secrets_groups.${groupName} must be a list of assignments`)

    const assignments = list.map((entry, index): SecretAssignment => {
      const where = `secrets_groups.${groupName}[${index}]`
      if (!isPlainObject(entry)) {
        return fail(`${where} must be a mapping`)
      }

      const accessType = oneOf(ACCESS_TYPES, entry.access_type ?? 'generic')
        ?? fail(`${where}.access_type must be one of ${ACCESS_TYPES.join(', ')}`)
      const secretType = oneOf(SECRET_TYPES, entry.secret_type)
        ?? fail(`${where}.secret_type must be one of ${SECRET_TYPES.join(', ')}`)
      const provider = oneOf(PROVIDERS, entry.provider)
        ?? fail(`${where}.provider must be one of ${PROVIDERS.join(', ')}`)

      const parameters: Record<string, string> = {}
      const rawParameters = entry.parameters ?? {}
      if (!isPlainObject(rawParameters)) {
        return fail(`${where}.parameters must be a mapping`)
      }
      for (const [key, value] of Object.entries(rawParameters)) {
        if (!isScalar(value)) {
          return fail(`${where}.parameters.${key} must be a scalar`)
        }
        parameters[key] = String(value)
      }

      return {
        accessType,
        secretType,
        secret: {
          name: optionalString(entry.name, `${where}.name`) ?? `${groupName}-${secretType}`,
          provider,
          parameters
        }
      }
    })

    secretsGroups.set(groupName, { name: groupName, assignments })
  }

  const platforms = new Map<string, InventoryPlatform>()
  for (const [platformName, value] of Object.entries(section('platforms'))) {
    const where = `platforms.${platformName}`
    const entry = value ?? {}
    const platform: PlainObject = isPlainObject(entry) ? entry : fail(`${where} must be a mapping`)

    const driverOptions: Record<string, DriverOptionValue> = {}
    const rawOptions = platform.driver_options ?? {}
    const options: PlainObject = isPlainObject(rawOptions)
      ? rawOptions
      : fail(`${where}.driver_options must be a mapping`)
    for (const [key, option] of Object.entries(options)) {
      if (isScalar(option)) {
        driverOptions[key] = option
      } else {
        fail(`${where}.driver_options.${key} must be a string, number or boolean`)
      }
    }

    platforms.set(platformName, {
      name: platformName,
      driver: optionalString(platform.driver, `${where}.driver`),
      driverOptions
    })
  }

  const devices = new Map<string, InventoryDevice>()
  for (const [deviceName, value] of Object.entries(section('devices'))) {
    const where = `devices.${deviceName}`
    const entry = value ?? {}
    const device: PlainObject = isPlainObject(entry) ? entry : fail(`${where} must be a mapping`)

    devices.set(deviceName, {
      name: deviceName,
      address: optionalString(device.address, `${where}.address`),
      platform: optionalString(device.platform, `${where}.platform`),
      secretsGroup: optionalString(device.secrets_group, `${where}.secrets_group`)
    })
  }

  return { source, devices, platforms, secretsGroups }
}

/**
 * Read and parse an inventory file
 */
export function loadInventory(inventoryPath: string): Inventory {
  if (!fs.existsSync(inventoryPath)) {
    throw new InvalidInventoryError('file does not exist', inventoryPath)
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(inventoryPath, 'utf-8'))
  } catch (err) {
    throw new InvalidInventoryError(errorMessage(err), inventoryPath, err)
  }

  return parseInventory(parsed, inventoryPath)
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Device names in inventory order
 */
export function listDevices(inventory: Inventory): string[] {
  return [...inventory.devices.keys()]
}

/**
 * @throws DeviceNotFoundError
 */
export function getDevice(inventory: Inventory, name: string): InventoryDevice {
  const device = inventory.devices.get(name)
  if (!device) {
    throw new DeviceNotFoundError(name, listDevices(inventory))
  }
  return device
}

/**
 * Drop a prefix length: "10.0.0.11/24" → "10.0.0.11"
 */
export function stripPrefixLength(address: string): string {
  const slash = address.indexOf('/')
  return (slash === -1 ? address : address.slice(0, slash)).trim()
}

/**
 * Check a device has what a deployment needs and build its DeviceTarget
 *
 * @throws DeviceValidationError
 */
export function toDeviceTarget(inventory: Inventory, device: InventoryDevice): DeviceTarget {
  if (!device.platform) {
    throw new DeviceValidationError(
      device.name,
      'has no platform configured',
      'Assign a platform to the device in the inventory'
    )
  }

  const platform = inventory.platforms.get(device.platform)
  if (!platform) {
    throw new DeviceValidationError(
      device.name,
      `references unknown platform '${device.platform}'`,
      `Define platforms.${device.platform} in the inventory`
    )
  }

  if (!platform.driver) {
    throw new DeviceValidationError(
      device.name,
      `platform '${platform.name}' has no driver configured`,
      `Set platforms.${platform.name}.driver in the inventory`
    )
  }

  const address = device.address ? stripPrefixLength(device.address) : ''
  if (address === '') {
    throw new DeviceValidationError(
      device.name,
      'has no primary IPv4 address',
      'Set the device address in the inventory'
    )
  }

  let secretsGroup: SecretsGroup | undefined
  if (device.secretsGroup) {
    secretsGroup = inventory.secretsGroups.get(device.secretsGroup)
    if (!secretsGroup) {
      throw new DeviceValidationError(
        device.name,
        `references unknown secrets group '${device.secretsGroup}'`,
        `Define secrets_groups.${device.secretsGroup} in the inventory`
      )
    }
  }

  return Object.freeze({
    name: device.name,
    address,
    driver: platform.driver,
    options: Object.freeze({ ...platform.driverOptions }),
    secretsGroup
  })
}
