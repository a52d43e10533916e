/**
 * Arista EOS transport (eAPI)
 *
 * Talks JSON-RPC `runCmds` to /command-api and stages candidates in a named
 * configuration session, so nothing touches running-config until commit.
 *
 *   stage   → configure session <name> [rollback clean-config] <lines> end
 *   diff    → show session-config named <name> diffs
 *   commit  → configure session <name> commit, write memory
 *   discard → configure session <name> abort
 *
 * Driver options: `transport` ("https" | "http", default https), `port`.
 */

import type {
  Credentials,
  DeviceFacts,
  DeviceTarget,
  DriverOptions,
  StageMode
} from '../types.js'
import type { TransportAdapter, TransportSession } from './types.js'
import {
  CloseFailure,
  CommitFailure,
  ConnectionFailure,
  DiscardFailure,
  FactsFailure,
  StageFailure,
  errorMessage
} from '../lib/errors.js'
import { isPlainObject } from '../lib/values.js'

type FetchFn = typeof fetch

type EapiFormat = 'json' | 'text'

export interface EosSession extends TransportSession {
  readonly endpoint: string
  readonly authorization: string
  readonly configSession: string
  /** A candidate is loaded in the config session and not yet committed or aborted */
  pending: boolean
  closed: boolean
}

export interface EosAdapterOptions {
  fetch?: FetchFn
}

/**
 * Error reported by the device for a runCmds call
 */
export class EapiCommandError extends Error {
  readonly code: number
  readonly details: string[]

  constructor(code: number, message: string, details: string[]) {
    super(details.length > 0 ? `${message} (${details.join('; ')})` : message)
    this.name = 'EapiCommandError'
    this.code = code
    this.details = details
  }
}

let sessionCounter = 0

/**
 * Candidate text as eAPI commands: no blank lines, no comments, no "end"
 */
export function toConfigCommands(config: string): string[] {
  return config
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => {
      const trimmed = line.trim()
      return trimmed !== '' && !trimmed.startsWith('!') && trimmed !== 'end'
    })
}

/**
 * Strip the ---/+++ header EOS puts in front of session diffs
 */
export function normalizeSessionDiff(output: string): string {
  const lines = output.split(/\r?\n/)
  while (lines.length > 0 && (lines[0].startsWith('---') || lines[0].startsWith('+++'))) {
    lines.shift()
  }
  return lines.join('\n').trim()
}

export class EosEapiAdapter implements TransportAdapter<EosSession> {
  readonly driver = 'eos'
  private readonly fetchFn: FetchFn

  constructor(options: EosAdapterOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch
  }

  async open(target: DeviceTarget, credentials: Credentials, options: DriverOptions): Promise<EosSession> {
    const transport = options.transport === 'http' ? 'http' : 'https'
    const port = typeof options.port === 'number' || typeof options.port === 'string'
      ? String(options.port)
      : transport === 'https' ? '443' : '80'

    sessionCounter++
    const session: EosSession = {
      id: `${target.name}#${sessionCounter}`,
      target,
      endpoint: `${transport}://${formatHost(target.address)}:${port}/command-api`,
      authorization: `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`,
      configSession: `netdeploy_${Date.now().toString(36)}_${sessionCounter}`,
      pending: false,
      closed: false
    }

    try {
      await this.runCmds(session, ['show version'], 'json')
    } catch (err) {
      throw new ConnectionFailure(target.name, errorMessage(err), err)
    }

    return session
  }

  async stage(session: EosSession, config: string, mode: StageMode): Promise<void> {
    const commands = [
      `configure session ${session.configSession}`,
      ...(mode === 'replace' ? ['rollback clean-config'] : []),
      ...toConfigCommands(config),
      'end'
    ]

    // The session exists on the device as soon as the first command runs
    session.pending = true
    try {
      await this.runCmds(session, commands, 'text')
    } catch (err) {
      throw new StageFailure(session.target.name, errorMessage(err), err)
    }
  }

  async diff(session: EosSession): Promise<string> {
    const [result] = await this.runCmds(
      session,
      [`show session-config named ${session.configSession} diffs`],
      'text'
    )
    return normalizeSessionDiff(textOutput(result))
  }

  async commit(session: EosSession): Promise<void> {
    try {
      await this.runCmds(session, [`configure session ${session.configSession} commit`], 'text')
    } catch (err) {
      // Session commits are atomic, but the device does not confirm a restore
      throw new CommitFailure(session.target.name, errorMessage(err), { cause: err })
    }
    session.pending = false

    try {
      await this.runCmds(session, ['write memory'], 'text')
    } catch (err) {
      throw new CommitFailure(
        session.target.name,
        `configuration applied but not saved to startup-config: ${errorMessage(err)}`,
        { cause: err }
      )
    }
  }

  async discard(session: EosSession): Promise<void> {
    if (!session.pending) return

    try {
      await this.abortConfigSession(session)
    } catch (err) {
      throw new DiscardFailure(session.target.name, errorMessage(err), err)
    }
  }

  async facts(session: EosSession): Promise<DeviceFacts> {
    let version: unknown
    let hostname: unknown
    try {
      [version, hostname] = await this.runCmds(session, ['show version', 'show hostname'], 'json')
    } catch (err) {
      throw new FactsFailure(session.target.name, errorMessage(err), err)
    }

    const facts: Record<string, string | number> = {}
    const pick = (source: unknown, from: string, to: string): void => {
      if (!isPlainObject(source)) return
      const value = source[from]
      if (typeof value === 'string' || typeof value === 'number') {
        facts[to] = value
      }
    }

    pick(hostname, 'hostname', 'hostname')
    pick(hostname, 'fqdn', 'fqdn')
    pick(version, 'modelName', 'model')
    pick(version, 'serialNumber', 'serialNumber')
    pick(version, 'version', 'osVersion')
    pick(version, 'uptime', 'uptime')
    facts.vendor = 'Arista'

    return facts
  }

  async close(session: EosSession): Promise<void> {
    if (session.closed) return
    session.closed = true

    if (!session.pending) return

    try {
      await this.abortConfigSession(session)
    } catch (err) {
      throw new CloseFailure(session.target.name, `pending config session not aborted: ${errorMessage(err)}`, err)
    }
  }

  private async abortConfigSession(session: EosSession): Promise<void> {
    await this.runCmds(session, [`configure session ${session.configSession} abort`], 'text')
    session.pending = false
  }

  /**
   * Run commands in privileged mode and return one result per command
   */
  private async runCmds(session: EosSession, cmds: string[], format: EapiFormat): Promise<unknown[]> {
    const response = await this.fetchFn(session.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: session.authorization
      },
      body: JSON.stringify({
        jsonrpc: '2.0',
        method: 'runCmds',
        params: { version: 1, cmds: ['enable', ...cmds], format },
        id: session.id
      })
    })

    if (response.status === 401) {
      throw new Error('authentication failed (HTTP 401)')
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${session.endpoint}`)
    }

    const body: unknown = await response.json()
    if (!isPlainObject(body)) {
      throw new Error('malformed eAPI response')
    }

    if (isPlainObject(body.error)) {
      const code = typeof body.error.code === 'number' ? body.error.code : -1
      const message = typeof body.error.message === 'string' ? body.error.message : 'eAPI error'
      throw new EapiCommandError(code, message, commandErrors(body.error.data))
    }

    if (!Array.isArray(body.result)) {
      throw new Error('malformed eAPI response: no result')
    }

    // Drop the result of the leading "enable"
    return body.result.slice(1)
  }
}

function formatHost(address: string): string {
  return address.includes(':') && !address.startsWith('[') ? `[${address}]` : address
}

function textOutput(result: unknown): string {
  if (isPlainObject(result) && typeof result.output === 'string') {
    return result.output
  }
  return ''
}

function commandErrors(data: unknown): string[] {
  if (!Array.isArray(data)) return []

  const messages: string[] = []
  for (const entry of data) {
    if (isPlainObject(entry) && Array.isArray(entry.errors)) {
      for (const message of entry.errors) {
        if (typeof message === 'string') messages.push(message)
      }
    }
  }
  return messages
}
