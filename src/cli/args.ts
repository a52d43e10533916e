/**
 * Parsed command line → CLIArgs
 */

import type { CLIArgs } from '../types.js'

/**
 * The parts of a cli-args-parser result the commands read
 */
export interface ParsedCommand {
  command: string[]
  options: object
  positional?: object
  rest?: unknown
}

function option(options: object, key: string): unknown {
  const value: unknown = Reflect.get(options, key)
  return value
}

function flag(options: object, key: string): boolean | undefined {
  const value = option(options, key)
  return typeof value === 'boolean' ? value : undefined
}

function text(options: object, key: string): string | undefined {
  const value = option(options, key)
  return typeof value === 'string' && value !== '' ? value : undefined
}

function integer(options: object, key: string): number | undefined {
  const value = option(options, key)
  const parsed = typeof value === 'string' ? Number(value) : value
  return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : undefined
}

/**
 * Convert a parse result to CLIArgs: `_` holds the command path followed by
 * positionals and the rest arguments
 */
export function toCliArgs(result: ParsedCommand): CLIArgs {
  const opts: object = result.options
  const args: string[] = [...result.command]

  const positional: object = result.positional ?? {}
  const extra: unknown[] = [
    ...Object.values(positional),
    ...(Array.isArray(result.rest) ? result.rest : [])
  ]
  for (const value of extra) {
    if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'string') args.push(item)
      }
    } else if (typeof value === 'string') {
      args.push(value)
    }
  }

  return {
    _: args,
    live: flag(opts, 'live'),
    replace: flag(opts, 'replace'),
    'skip-commit': flag(opts, 'skip-commit'),
    all: flag(opts, 'all'),
    'stop-on-error': flag(opts, 'stop-on-error'),
    concurrency: integer(opts, 'concurrency'),
    json: flag(opts, 'json'),
    verbose: flag(opts, 'verbose'),
    quiet: flag(opts, 'quiet'),
    path: text(opts, 'path')
  }
}

/**
 * Device names from positionals: "leaf1,leaf2 spine1" → [leaf1, leaf2, spine1]
 * Duplicates are dropped, first occurrence wins.
 */
export function parseDeviceList(values: string[]): string[] {
  const names = values
    .flatMap(value => value.split(','))
    .map(name => name.trim())
    .filter(name => name !== '')
  return [...new Set(names)]
}
