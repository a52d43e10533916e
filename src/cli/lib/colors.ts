/**
 * netdeploy CLI - Colors Utility
 *
 * ANSI 256 palette, disabled by NO_COLOR or when stderr is not a TTY.
 * Diagnostics go to stderr, so that is the stream whose TTY-ness counts.
 */

import type { Formatter } from 'cli-args-parser'
import type { DeploymentStatus, LogLevel } from '../../types.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Palette (ANSI 256):
 * - 37:  Teal      : primary, commands
 * - 43:  Aqua      : highlights
 * - 110: Slate     : secondary, options
 * - 252: Light gray: text
 * - 245: Gray      : muted text
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  teal: (s: string) => enabled ? `\x1b[38;5;37m${s}\x1b[39m` : s,
  aqua: (s: string) => enabled ? `\x1b[38;5;43m${s}\x1b[39m` : s,
  slate: (s: string) => enabled ? `\x1b[38;5;110m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

export { ansi }

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

/**
 * Help/version formatter for cli-args-parser
 */
export const netdeployFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.teal(s)),
  'version': s => ansi.aqua(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.teal(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.aqua(s),
  'option-type': s => ansi.slate(s),
  'option-default': s => ansi.dim(ansi.slate(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.slate(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.teal(s),
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.teal(text)),
  device: (text: string) => ansi.bold(ansi.aqua(text)),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  added: (text: string) => ansi.green(text),
  removed: (text: string) => ansi.red(text),
  unchanged: (text: string) => ansi.gray(text),

  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.teal('ℹ') : '[INFO]',
  debug: enabled ? ansi.gray('·') : '[DEBUG]',
}

/**
 * Status word colored by outcome
 */
export function colorStatus(status: DeploymentStatus): string {
  switch (status) {
    case 'committed':
      return c.success(status)
    case 'failed':
    case 'rolled_back':
      return c.error(status)
    case 'dry_run_discarded':
    case 'discarded':
      return c.warning(status)
    default:
      return c.unchanged(status)
  }
}

/**
 * Color +/- lines of a unified diff
 */
export function colorDiff(diff: string): string {
  return diff
    .split('\n')
    .map(line => {
      if (line.startsWith('+')) return c.added(line)
      if (line.startsWith('-')) return c.removed(line)
      return line
    })
    .join('\n')
}

/**
 * Console logger decoration: symbol + colored message
 */
export function decorateLog(level: LogLevel, message: string): string {
  switch (level) {
    case 'debug':
      return `${symbols.debug} ${c.muted(message)}`
    case 'info':
      return `${symbols.info} ${message}`
    case 'warning':
      return `${symbols.warning} ${c.warning(message)}`
    case 'error':
      return `${symbols.error} ${c.error(message)}`
    case 'success':
      return `${symbols.success} ${c.success(message)}`
  }
}

// Print utilities
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
}
