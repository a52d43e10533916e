/**
 * Job logging
 *
 * The job runner is the sink for every diagnostic the deployment workflow emits.
 * Messages are tiered: debug, info, warning, error, success.
 *
 * - Console logger: stderr only, so stdout stays clean for --json output
 * - DiagnosticTrail: records entries for the DeploymentResult and scrubs secrets
 */

import type { DiagnosticEntry, LogLevel } from '../types.js'
import { redactSecrets } from './masking.js'

export interface JobLogger {
  debug(message: string): void
  info(message: string): void
  warning(message: string): void
  error(message: string): void
  success(message: string): void
}

export interface ConsoleLoggerOptions {
  /** Show debug and info messages (warnings, errors and successes always show) */
  verbose?: boolean
  /** Suppress success messages (errors and warnings still shown) */
  quiet?: boolean
  /** Decorate a line before it is written (colors, symbols) */
  decorate?: (level: LogLevel, message: string) => string
  /** Line writer (default: console.error) */
  write?: (line: string) => void
}

const PLAIN_PREFIX: Record<LogLevel, string> = {
  debug: '[netdeploy] ',
  info: '',
  warning: 'Warning: ',
  error: 'Error: ',
  success: '✓ '
}

/**
 * Logger writing to stderr with the job runner's visibility rules
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): JobLogger {
  const {
    verbose = false,
    quiet = false,
    decorate = (level: LogLevel, message: string) => `${PLAIN_PREFIX[level]}${message}`,
    write = (line: string) => console.error(line)
  } = options

  const emit = (level: LogLevel, message: string): void => {
    if ((level === 'debug' || level === 'info') && !verbose) return
    if (level === 'success' && quiet) return
    write(decorate(level, message))
  }

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warning: message => emit('warning', message),
    error: message => emit('error', message),
    success: message => emit('success', message)
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: JobLogger = {
  debug: () => {},
  info: () => {},
  warning: () => {},
  error: () => {},
  success: () => {}
}

/**
 * Records one deployment attempt's diagnostics and forwards them to a sink.
 *
 * Registered secrets are replaced with ******** before a message is recorded
 * or forwarded, whatever level it is logged at.
 */
export class DiagnosticTrail implements JobLogger {
  private readonly sink: JobLogger
  private readonly secrets: string[] = []
  private readonly recorded: DiagnosticEntry[] = []

  constructor(sink: JobLogger = silentLogger) {
    this.sink = sink
  }

  /** Register a value that must never appear in diagnostics */
  redact(secret: string): void {
    if (secret.length > 0 && !this.secrets.includes(secret)) {
      this.secrets.push(secret)
    }
  }

  /** Text with every registered secret replaced */
  scrub(text: string): string {
    return redactSecrets(text, this.secrets)
  }

  get entries(): readonly DiagnosticEntry[] {
    return this.recorded.slice()
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  warning(message: string): void {
    this.log('warning', message)
  }

  error(message: string): void {
    this.log('error', message)
  }

  success(message: string): void {
    this.log('success', message)
  }

  private log(level: LogLevel, message: string): void {
    const clean = this.scrub(message)
    this.recorded.push({ level, message: clean, at: new Date().toISOString() })
    this.sink[level](clean)
  }
}
