import type { CLIArgs, NetdeployConfig } from '../types.js'
import type { JobLogger } from '../lib/logger.js'

/**
 * Everything a command handler needs
 */
export interface CommandContext {
  args: CLIArgs
  config: NetdeployConfig
  /** The .netdeploy directory */
  configDir: string
  verbose: boolean
  quiet: boolean
  jsonOutput: boolean
  logger: JobLogger
}
