#!/usr/bin/env node
/**
 * netdeploy CLI
 *
 * Pushes intended configurations to network devices
 */

import dotenv from 'dotenv'
import { createCLI, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs } from '../types.js'
import type { CommandContext } from './context.js'
import { loadConfig } from '../lib/config-loader.js'
import { createConsoleLogger } from '../lib/logger.js'
import { isNetdeployError, formatErrorForCli, errorMessage } from '../lib/errors.js'
import { isPlainObject } from '../lib/values.js'
import { c, decorateLog, netdeployFormatter, print } from './lib/colors.js'
import { toCliArgs } from './args.js'
import { runProvision } from './commands/provision.js'
import { runDevices } from './commands/devices.js'
import * as ui from './ui.js'

const VERSION = process.env.NETDEPLOY_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this file to the nearest package.json
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      return isPlainObject(pkg) && typeof pkg.version === 'string' ? pkg.version : undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

const liveOption = {
  type: 'boolean',
  default: false,
  description: 'Commit changes (without it every run is a dry run)'
} as const

const replaceOption = {
  type: 'boolean',
  default: false,
  description: 'Replace the entire configuration instead of merging (use with caution!)'
} as const

const skipCommitOption = {
  type: 'boolean',
  default: false,
  description: 'Load and diff, then discard even in live mode'
} as const

const allOption = {
  type: 'boolean',
  default: false,
  description: 'Every device in the inventory'
} as const

const concurrencyOption = {
  short: 'c',
  type: 'number',
  description: 'Devices deployed at once (default: from config)'
} as const

const stopOnErrorOption = {
  type: 'boolean',
  default: false,
  description: 'Do not start more devices after a failure'
} as const

const cliSchema: CLISchema = {
  name: 'netdeploy',
  version: VERSION,
  description: 'Push intended configurations to network devices',
  autoShort: false,
  strict: true,
  formatter: netdeployFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Show info and debug logs'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    path: {
      type: 'string',
      description: 'Project directory for .netdeploy config discovery'
    }
  },

  commands: {
    provision: {
      description: 'Deploy intended configuration to devices (dry run unless --live)',
      aliases: ['deploy'],
      positional: [
        { name: 'devices', description: 'Device names, comma-separated' }
      ],
      options: {
        live: liveOption,
        replace: replaceOption,
        'skip-commit': skipCommitOption,
        all: allOption,
        concurrency: concurrencyOption,
        'stop-on-error': stopOnErrorOption
      }
    },

    diff: {
      description: 'Show what provisioning would change, always discarding',
      positional: [
        { name: 'devices', description: 'Device names, comma-separated' }
      ],
      options: {
        all: allOption,
        replace: replaceOption,
        concurrency: concurrencyOption
      }
    },

    devices: {
      description: 'List inventory devices and whether they can be provisioned',
      aliases: ['ls']
    }
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

function buildContext(args: CLIArgs): CommandContext {
  const verbose = args.verbose === true
  const quiet = args.quiet === true
  ui.setQuiet(quiet)

  const { config, configDir } = loadConfig()

  return {
    args,
    config,
    configDir,
    verbose,
    quiet,
    jsonOutput: args.json === true,
    logger: createConsoleLogger({ verbose, quiet, decorate: decorateLog })
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)

  // Handle help first (before error check, so `provision --help` works)
  if (Reflect.get(result.options, 'help') === true || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (Reflect.get(result.options, 'version') === true) {
    ui.output(`netdeploy v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exitCode = 1
    return
  }

  if (args.path) {
    const targetDir = path.resolve(args.path)
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      print.error(`Path does not exist or is not a directory: ${targetDir}`)
      process.exitCode = 1
      return
    }
    process.chdir(targetDir)
  }

  // Secrets from environment-variable providers may live in .env
  dotenv.config()

  const command = result.command[0]
  let context: CommandContext | undefined

  try {
    context = buildContext(args)

    switch (command) {
      case 'provision':
      case 'deploy':
        process.exitCode = await runProvision(context)
        break

      case 'diff':
        process.exitCode = await runProvision(context, { forceDryRun: true })
        break

      case 'devices':
      case 'ls':
        process.exitCode = await runDevices(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('netdeploy --help')}" for usage information`)
        process.exitCode = 1
    }
  } catch (err) {
    if (isNetdeployError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (context?.verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (context?.verbose && err instanceof Error && err.stack) {
      ui.log(err.stack)
    } else {
      print.error(errorMessage(err))
    }
    process.exitCode = 1
  }
}

// Run
main().catch((err: unknown) => {
  // Handle uncaught errors at the top level
  const message = isNetdeployError(err)
    ? formatErrorForCli(err)
    : `Fatal error: ${errorMessage(err)}`
  print.error(message)
  process.exit(1)
})
