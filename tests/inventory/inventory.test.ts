/**
 * Tests for inventory/inventory.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import {
  getDevice,
  listDevices,
  loadInventory,
  parseInventory,
  stripPrefixLength,
  toDeviceTarget,
  type Inventory
} from '../../src/inventory/inventory.js'
import {
  DeviceNotFoundError,
  DeviceValidationError,
  InvalidInventoryError
} from '../../src/lib/errors.js'

const INVENTORY_YAML = `
secrets_groups:
  lab:
    - secret_type: username
      provider: environment-variable
      parameters:
        variable: LAB_USERNAME
    - access_type: generic
      secret_type: password
      provider: text-file
      name: lab-password-file
      parameters:
        path: /run/secrets/{{ device.name }}

platforms:
  arista_eos:
    driver: eos
    driver_options:
      transport: https
      port: 443
  bare:
    driver_options: {}

devices:
  leaf1:
    address: 10.0.0.11/24
    platform: arista_eos
    secrets_group: lab
  leaf2:
    address: 10.0.0.12
    platform: arista_eos
  spine1:
    address: 10.0.0.1/31
  oob1:
    address: 10.0.0.50
    platform: bare
  leaf3:
    platform: arista_eos
  leaf4:
    address: 10.0.0.14
    platform: junos_qfx
  leaf5:
    address: 10.0.0.15
    platform: arista_eos
    secrets_group: prod
`

function inventory(): Inventory {
  return parseInventory(parseYaml(INVENTORY_YAML))
}

function validationProblem(name: string): string {
  const inv = inventory()
  try {
    toDeviceTarget(inv, getDevice(inv, name))
  } catch (err) {
    if (err instanceof DeviceValidationError) return err.message
    throw err
  }
  return 'valid'
}

describe('parseInventory', () => {
  it('should parse secrets groups with defaults', () => {
    const lab = inventory().secretsGroups.get('lab')

    expect(lab).toEqual({
      name: 'lab',
      assignments: [
        {
          accessType: 'generic',
          secretType: 'username',
          secret: {
            name: 'lab-username',
            provider: 'environment-variable',
            parameters: { variable: 'LAB_USERNAME' }
          }
        },
        {
          accessType: 'generic',
          secretType: 'password',
          secret: {
            name: 'lab-password-file',
            provider: 'text-file',
            parameters: { path: '/run/secrets/{{ device.name }}' }
          }
        }
      ]
    })
  })

  it('should parse platforms and devices', () => {
    const inv = inventory()

    expect(inv.platforms.get('arista_eos')).toEqual({
      name: 'arista_eos',
      driver: 'eos',
      driverOptions: { transport: 'https', port: 443 }
    })
    expect(inv.platforms.get('bare')?.driver).toBeUndefined()
    expect(inv.devices.get('leaf1')).toEqual({
      name: 'leaf1',
      address: '10.0.0.11/24',
      platform: 'arista_eos',
      secretsGroup: 'lab'
    })
  })

  it('should accept an empty document', () => {
    const inv = parseInventory(null)

    expect(inv.devices.size).toBe(0)
    expect(inv.platforms.size).toBe(0)
    expect(inv.secretsGroups.size).toBe(0)
  })

  it('should reject a non-mapping document', () => {
    expect(() => parseInventory(['leaf1'], 'inventory.yaml'))
      .toThrow('Invalid inventory in inventory.yaml: top level must be a mapping')
  })

  it('should reject unknown secret providers', () => {
    const raw = { secrets_groups: { lab: [{ secret_type: 'password', provider: 'vault' }] } }

    expect(() => parseInventory(raw))
      .toThrow('Invalid inventory: secrets_groups.lab[0].provider must be one of environment-variable, text-file')
  })

  it('should reject a secrets group that is not a list', () => {
    const raw = { secrets_groups: { lab: { provider: 'text-file' } } }

    expect(() => parseInventory(raw)).toThrow(InvalidInventoryError)
  })

  it('should reject nested driver options', () => {
    const raw = { platforms: { eos: { driver: 'eos', driver_options: { tls: { verify: false } } } } }

    expect(() => parseInventory(raw))
      .toThrow('Invalid inventory: platforms.eos.driver_options.tls must be a string, number or boolean')
  })
})

describe('loadInventory', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'netdeploy-inventory-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should read the file and remember its source', () => {
    const file = path.join(tempDir, 'inventory.yaml')
    fs.writeFileSync(file, INVENTORY_YAML)

    const inv = loadInventory(file)

    expect(inv.source).toBe(file)
    expect(listDevices(inv)).toEqual(['leaf1', 'leaf2', 'spine1', 'oob1', 'leaf3', 'leaf4', 'leaf5'])
  })

  it('should fail for a missing file', () => {
    const file = path.join(tempDir, 'missing.yaml')

    expect(() => loadInventory(file)).toThrow(`Invalid inventory in ${file}: file does not exist`)
  })

  it('should wrap YAML syntax errors', () => {
    const file = path.join(tempDir, 'inventory.yaml')
    fs.writeFileSync(file, 'devices: [leaf1\n')

    expect(() => loadInventory(file)).toThrow(InvalidInventoryError)
  })
})

describe('getDevice', () => {
  it('should list known devices when the name is unknown', () => {
    let caught: unknown
    try {
      getDevice(inventory(), 'core9')
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(DeviceNotFoundError)
    expect(caught).toMatchObject({
      message: 'Device "core9" not found in inventory',
      suggestion: 'Known devices: leaf1, leaf2, spine1, oob1, leaf3, leaf4, leaf5'
    })
  })
})

describe('stripPrefixLength', () => {
  it('should drop the prefix length', () => {
    expect(stripPrefixLength('10.0.0.11/24')).toBe('10.0.0.11')
    expect(stripPrefixLength('10.0.0.11')).toBe('10.0.0.11')
    expect(stripPrefixLength('2001:db8::11/64')).toBe('2001:db8::11')
  })
})

describe('toDeviceTarget', () => {
  it('should build a frozen target with the secrets group attached', () => {
    const inv = inventory()

    const target = toDeviceTarget(inv, getDevice(inv, 'leaf1'))

    expect(target).toEqual({
      name: 'leaf1',
      address: '10.0.0.11',
      driver: 'eos',
      options: { transport: 'https', port: 443 },
      secretsGroup: inv.secretsGroups.get('lab')
    })
    expect(Object.isFrozen(target)).toBe(true)
    expect(Object.isFrozen(target.options)).toBe(true)
  })

  it('should leave the secrets group unset when the device has none', () => {
    const inv = inventory()

    expect(toDeviceTarget(inv, getDevice(inv, 'leaf2')).secretsGroup).toBeUndefined()
  })

  it.each([
    ['spine1', 'Device spine1 has no platform configured'],
    ['oob1', "Device oob1 platform 'bare' has no driver configured"],
    ['leaf3', 'Device leaf3 has no primary IPv4 address'],
    ['leaf4', "Device leaf4 references unknown platform 'junos_qfx'"],
    ['leaf5', "Device leaf5 references unknown secrets group 'prod'"]
  ])('should reject %s', (name, message) => {
    expect(validationProblem(name)).toBe(message)
  })
})
