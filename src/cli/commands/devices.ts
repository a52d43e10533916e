/**
 * netdeploy CLI - Devices Command
 *
 * Lists the inventory and whether each device is ready to provision
 */

import type { CommandContext } from '../context.js'
import type { Inventory } from '../../inventory/inventory.js'
import { listDevices, loadInventory, toDeviceTarget } from '../../inventory/inventory.js'
import { DeviceValidationError } from '../../lib/errors.js'
import { resolveConfigPath } from '../../lib/config-loader.js'
import { c, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface DeviceRow {
  name: string
  address: string
  platform: string
  driver: string
  secretsGroup: string
  /** Validation problem, undefined when the device is ready */
  problem?: string
}

/**
 * One row per device, in inventory order
 */
export function describeDevices(inventory: Inventory): DeviceRow[] {
  return listDevices(inventory).map(name => {
    const device = inventory.devices.get(name)
    const platform = device?.platform ? inventory.platforms.get(device.platform) : undefined
    const row: DeviceRow = {
      name,
      address: device?.address ?? '',
      platform: device?.platform ?? '',
      driver: platform?.driver ?? '',
      secretsGroup: device?.secretsGroup ?? ''
    }

    if (device) {
      try {
        const target = toDeviceTarget(inventory, device)
        row.address = target.address
      } catch (err) {
        if (!(err instanceof DeviceValidationError)) throw err
        row.problem = err.message
      }
    }

    return row
  })
}

export async function runDevices(context: CommandContext, inventory?: Inventory): Promise<number> {
  const inv = inventory ?? loadInventory(resolveConfigPath(context.configDir, context.config.inventory))
  const rows = describeDevices(inv)

  if (context.jsonOutput) {
    ui.output(JSON.stringify(rows.map(row => ({ ...row, ready: row.problem === undefined })), null, 2))
    return 0
  }

  if (rows.length === 0) {
    ui.log(`${symbols.info} The inventory has no devices`)
    return 0
  }

  ui.output(ui.formatSimpleTable(
    ['DEVICE', 'ADDRESS', 'PLATFORM', 'DRIVER', 'SECRETS GROUP', 'STATUS'],
    rows.map(row => [
      row.name,
      row.address,
      row.platform,
      row.driver,
      row.secretsGroup,
      row.problem === undefined ? 'ready' : 'invalid'
    ])
  ))

  for (const row of rows) {
    if (row.problem !== undefined) {
      ui.log(`${symbols.warning} ${c.warning(row.problem)}`)
    }
  }

  return 0
}
