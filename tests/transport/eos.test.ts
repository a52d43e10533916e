/**
 * Tests for transport/eos.ts
 *
 * eAPI is served by an in-process fetch stand-in that records every runCmds call.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  EosEapiAdapter,
  normalizeSessionDiff,
  toConfigCommands,
  type EosSession
} from '../../src/transport/eos.js'
import type { Credentials } from '../../src/types.js'
import { CommitFailure, ConnectionFailure, StageFailure } from '../../src/lib/errors.js'
import { isPlainObject, type PlainObject } from '../../src/lib/values.js'
import { makeTarget } from '../helpers/fake-transport.js'

const CREDENTIALS: Credentials = {
  username: 'admin',
  password: 'test-secret',
  provenance: 'default',
  fields: { username: 'default', password: 'default' }
}

interface EapiCall {
  url: string
  authorization: string | null
  cmds: string[]
  format: unknown
}

type Reply = (cmds: string[]) => Response

function result(...outputs: unknown[]): Response {
  return Response.json({ jsonrpc: '2.0', id: 'test', result: [{}, ...outputs] })
}

function eapiError(message: string, errors: string[]): Response {
  return Response.json({
    jsonrpc: '2.0',
    id: 'test',
    error: { code: 1002, message, data: [{}, { errors }] }
  })
}

function parseRequest(url: string, init: RequestInit | undefined): EapiCall {
  const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
  const params: PlainObject = isPlainObject(body) && isPlainObject(body.params) ? body.params : {}
  const cmds = Array.isArray(params.cmds)
    ? params.cmds.filter((cmd): cmd is string => typeof cmd === 'string')
    : []
  return {
    url,
    authorization: new Headers(init?.headers).get('Authorization'),
    cmds,
    format: params.format
  }
}

/**
 * fetch stand-in; `reply` sees the commands after the leading "enable"
 */
function fakeEapi(reply: Reply = () => result({})) {
  const calls: EapiCall[] = []
  const fetch = vi.fn<typeof globalThis.fetch>(async (input, init) => {
    const call = parseRequest(String(input), init)
    calls.push(call)
    return reply(call.cmds.slice(1))
  })
  return { fetch, calls }
}

async function openSession(reply?: Reply) {
  const eapi = fakeEapi(reply)
  const adapter = new EosEapiAdapter({ fetch: eapi.fetch })
  const session = await adapter.open(makeTarget({ driver: 'eos' }), CREDENTIALS, {})
  eapi.calls.length = 0
  return { adapter, session, calls: eapi.calls }
}

function configSessionCmd(session: EosSession, action: string): string {
  return `configure session ${session.configSession} ${action}`
}

describe('toConfigCommands', () => {
  it('should drop blank lines, comments and end', () => {
    const config = '! leaf1\nhostname leaf1\n\nvlan 10\n   name users   \nend\n'

    expect(toConfigCommands(config)).toEqual(['hostname leaf1', 'vlan 10', '   name users'])
  })
})

describe('normalizeSessionDiff', () => {
  it('should strip the file header', () => {
    const output = '--- system:/running-config\n+++ session:/s1-session-config\n@@ -1 +1 @@\n-hostname old\n+hostname leaf1\n'

    expect(normalizeSessionDiff(output)).toBe('@@ -1 +1 @@\n-hostname old\n+hostname leaf1')
  })

  it('should return an empty string for an empty diff', () => {
    expect(normalizeSessionDiff('\n')).toBe('')
  })
})

describe('EosEapiAdapter', () => {
  describe('open', () => {
    it('should probe the device over https with basic auth', async () => {
      const eapi = fakeEapi()
      const adapter = new EosEapiAdapter({ fetch: eapi.fetch })

      const session = await adapter.open(makeTarget({ driver: 'eos' }), CREDENTIALS, {})

      expect(session.endpoint).toBe('https://192.0.2.11:443/command-api')
      expect(session.pending).toBe(false)
      expect(eapi.calls).toEqual([{
        url: 'https://192.0.2.11:443/command-api',
        authorization: `Basic ${Buffer.from('admin:test-secret').toString('base64')}`,
        cmds: ['enable', 'show version'],
        format: 'json'
      }])
    })

    it('should honour transport and port driver options', async () => {
      const adapter = new EosEapiAdapter({ fetch: fakeEapi().fetch })

      const session = await adapter.open(makeTarget(), CREDENTIALS, { transport: 'http', port: 8080 })

      expect(session.endpoint).toBe('http://192.0.2.11:8080/command-api')
    })

    it('should bracket IPv6 addresses', async () => {
      const adapter = new EosEapiAdapter({ fetch: fakeEapi().fetch })

      const session = await adapter.open(makeTarget({ address: '2001:db8::11' }), CREDENTIALS, {})

      expect(session.endpoint).toBe('https://[2001:db8::11]:443/command-api')
    })

    it('should map a rejected login to ConnectionFailure', async () => {
      const adapter = new EosEapiAdapter({ fetch: fakeEapi(() => new Response('', { status: 401 })).fetch })

      const attempt = adapter.open(makeTarget(), CREDENTIALS, {})

      await expect(attempt).rejects.toBeInstanceOf(ConnectionFailure)
      await expect(attempt).rejects.toThrow('Connection to leaf1 failed: authentication failed (HTTP 401)')
    })

    it('should map network errors to ConnectionFailure', async () => {
      const fetch = vi.fn<typeof globalThis.fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'))
      const adapter = new EosEapiAdapter({ fetch })

      await expect(adapter.open(makeTarget(), CREDENTIALS, {}))
        .rejects.toThrow('Connection to leaf1 failed: connect ECONNREFUSED')
    })
  })

  describe('stage', () => {
    it('should load a replace candidate into a config session', async () => {
      const { adapter, session, calls } = await openSession()

      await adapter.stage(session, 'hostname leaf1\nvlan 10\n', 'replace')

      expect(calls).toHaveLength(1)
      expect(calls[0].format).toBe('text')
      expect(calls[0].cmds).toEqual([
        'enable',
        `configure session ${session.configSession}`,
        'rollback clean-config',
        'hostname leaf1',
        'vlan 10',
        'end'
      ])
      expect(session.pending).toBe(true)
    })

    it('should not clear the session in merge mode', async () => {
      const { adapter, session, calls } = await openSession()

      await adapter.stage(session, 'vlan 10\n', 'merge')

      expect(calls[0].cmds).toEqual(['enable', `configure session ${session.configSession}`, 'vlan 10', 'end'])
    })

    it('should map command errors to StageFailure and leave the session pending', async () => {
      const { adapter, session } = await openSession(cmds =>
        cmds[0].startsWith('configure session') && cmds.length > 1
          ? eapiError('CLI command 3 of 4 failed', ['Invalid input'])
          : result({})
      )

      const attempt = adapter.stage(session, 'vlan bogus\n', 'merge')

      await expect(attempt).rejects.toBeInstanceOf(StageFailure)
      await expect(attempt).rejects.toThrow(
        'Loading candidate configuration on leaf1 failed: CLI command 3 of 4 failed (Invalid input)'
      )
      expect(session.pending).toBe(true)
    })
  })

  describe('diff', () => {
    it('should return the session diff without its header', async () => {
      const { adapter, session, calls } = await openSession(() =>
        result({ output: '--- system:/running-config\n+++ session:/s-session-config\n+vlan 10\n' })
      )

      await expect(adapter.diff(session)).resolves.toBe('+vlan 10')
      expect(calls[0].cmds).toEqual(['enable', `show session-config named ${session.configSession} diffs`])
    })

    it('should return an empty string when the output is missing', async () => {
      const { adapter, session } = await openSession(() => result({}))

      await expect(adapter.diff(session)).resolves.toBe('')
    })
  })

  describe('commit', () => {
    it('should commit the session and save to startup-config', async () => {
      const { adapter, session, calls } = await openSession()
      await adapter.stage(session, 'vlan 10\n', 'merge')
      calls.length = 0

      await adapter.commit(session)

      expect(calls.map(call => call.cmds.slice(1))).toEqual([
        [configSessionCmd(session, 'commit')],
        ['write memory']
      ])
      expect(session.pending).toBe(false)
    })

    it('should report an unsaved configuration without claiming a rollback', async () => {
      const { adapter, session } = await openSession(cmds =>
        cmds[0] === 'write memory' ? eapiError('write failed', []) : result({})
      )

      const attempt = adapter.commit(session)

      await expect(attempt).rejects.toThrow(
        'Commit on leaf1 failed: configuration applied but not saved to startup-config: write failed'
      )
      await expect(attempt).rejects.toMatchObject({ rolledBack: false })
    })

    it('should map a failed session commit to CommitFailure', async () => {
      const { adapter, session } = await openSession(cmds =>
        cmds[0] === 'show version' ? result({}) : eapiError('commit rejected', [])
      )

      await expect(adapter.commit(session)).rejects.toBeInstanceOf(CommitFailure)
    })
  })

  describe('discard', () => {
    it('should abort a pending session', async () => {
      const { adapter, session, calls } = await openSession()
      await adapter.stage(session, 'vlan 10\n', 'merge')
      calls.length = 0

      await adapter.discard(session)

      expect(calls.map(call => call.cmds.slice(1))).toEqual([[configSessionCmd(session, 'abort')]])
      expect(session.pending).toBe(false)
    })

    it('should do nothing when no candidate is pending', async () => {
      const { adapter, session, calls } = await openSession()

      await adapter.discard(session)

      expect(calls).toEqual([])
    })
  })

  describe('facts', () => {
    it('should collect hostname and version facts', async () => {
      const { adapter, session, calls } = await openSession(() =>
        result(
          { modelName: 'DCS-7050SX3', serialNumber: 'SN0001', version: '4.30.1F', uptime: 3600 },
          { hostname: 'leaf1', fqdn: 'leaf1.lab.example' }
        )
      )

      const facts = await adapter.facts(session)

      expect(calls[0].cmds).toEqual(['enable', 'show version', 'show hostname'])
      expect(facts).toEqual({
        hostname: 'leaf1',
        fqdn: 'leaf1.lab.example',
        model: 'DCS-7050SX3',
        serialNumber: 'SN0001',
        osVersion: '4.30.1F',
        uptime: 3600,
        vendor: 'Arista'
      })
    })
  })

  describe('close', () => {
    it('should abort a pending session once', async () => {
      const { adapter, session, calls } = await openSession()
      await adapter.stage(session, 'vlan 10\n', 'merge')
      calls.length = 0

      await adapter.close(session)
      await adapter.close(session)

      expect(calls.map(call => call.cmds.slice(1))).toEqual([[configSessionCmd(session, 'abort')]])
      expect(session.closed).toBe(true)
    })

    it('should not call the device when nothing is pending', async () => {
      const { adapter, session, calls } = await openSession()

      await adapter.close(session)

      expect(calls).toEqual([])
    })
  })
})
