/**
 * Configuration-intent store
 *
 * Supplies the intended ("golden") configuration text for a device.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { DeviceTarget } from '../types.js'
import type { JobLogger } from '../lib/logger.js'
import { silentLogger } from '../lib/logger.js'
import { ConfigUnavailableError, errorMessage } from '../lib/errors.js'

export interface ConfigSource {
  /**
   * @throws ConfigUnavailableError when nothing usable exists for the device
   */
  getIntendedConfig(target: DeviceTarget, logger?: JobLogger): Promise<string>
}

export interface FileConfigSourceOptions {
  /** Directory holding the intended configs */
  dir: string
  /** File name pattern, `{name}` is replaced with the device name */
  filename?: string
  logger?: JobLogger
}

const PREVIEW_LINES = 10

/**
 * Intended configs stored as one file per device
 */
export class FileConfigSource implements ConfigSource {
  private readonly dir: string
  private readonly filename: string
  private readonly logger: JobLogger

  constructor(options: FileConfigSourceOptions) {
    this.dir = options.dir
    this.filename = options.filename ?? '{name}.cfg'
    this.logger = options.logger ?? silentLogger
  }

  pathFor(target: DeviceTarget): string {
    return path.join(this.dir, this.filename.replaceAll('{name}', target.name))
  }

  async getIntendedConfig(target: DeviceTarget, logger: JobLogger = this.logger): Promise<string> {
    const file = this.pathFor(target)
    logger.info(`Reading intended configuration from ${file}...`)

    let text: string
    let modified: Date
    try {
      const stats = await fs.promises.stat(file)
      modified = stats.mtime
      text = await fs.promises.readFile(file, 'utf-8')
    } catch (err) {
      logger.warning(`No intended configuration found for ${target.name}`)
      throw new ConfigUnavailableError(target.name, errorMessage(err))
    }

    if (text.trim() === '') {
      logger.warning(`Intended configuration file for ${target.name} exists but is empty`)
      throw new ConfigUnavailableError(target.name, `${file} is empty`)
    }

    logger.success(`Found intended config (last updated: ${modified.toISOString()})`)
    const preview = text.split('\n').slice(0, PREVIEW_LINES).join('\n')
    logger.info(`Config preview:\n${preview}\n...`)

    return text
  }
}
