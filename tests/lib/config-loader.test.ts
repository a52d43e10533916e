/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  findConfigDir,
  loadConfig,
  normalizeConfig,
  expandEnvVars,
  resolveConfigPath,
  DEFAULT_CONFIG
} from '../../src/lib/config-loader.js'
import { ConfigNotFoundError, InvalidConfigError } from '../../src/lib/errors.js'

describe('config-loader', () => {
  let tempDir: string
  let originalEnv: NodeJS.ProcessEnv

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'netdeploy-config-test-'))
    originalEnv = { ...process.env }
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    process.env = originalEnv
  })

  function writeConfig(dir: string, content: string, file = 'config.yaml'): string {
    const configDir = path.join(dir, '.netdeploy')
    fs.mkdirSync(configDir, { recursive: true })
    fs.writeFileSync(path.join(configDir, file), content)
    return configDir
  }

  describe('findConfigDir', () => {
    it('should find .netdeploy directory in current directory', () => {
      const configDir = writeConfig(tempDir, 'version: "1"')

      expect(findConfigDir(tempDir)).toBe(configDir)
    })

    it('should find .netdeploy directory in parent directory', () => {
      const configDir = writeConfig(tempDir, 'version: "1"')
      const childDir = path.join(tempDir, 'sites', 'lab')
      fs.mkdirSync(childDir, { recursive: true })

      expect(findConfigDir(childDir)).toBe(configDir)
    })

    it('should ignore a .netdeploy directory without config.yaml', () => {
      fs.mkdirSync(path.join(tempDir, '.netdeploy'))
      const childDir = path.join(tempDir, 'a', 'b', 'c', 'd', 'e', 'f')
      fs.mkdirSync(childDir, { recursive: true })

      expect(findConfigDir(childDir)).toBeNull()
    })
  })

  describe('loadConfig', () => {
    it('should merge the file over the defaults', () => {
      const configDir = writeConfig(tempDir, [
        'version: "1"',
        'inventory: sites/lab.yaml',
        'timeouts:',
        '  commit: 300000',
        'concurrency: 8'
      ].join('\n'))

      const loaded = loadConfig(tempDir)

      expect(loaded.configDir).toBe(configDir)
      expect(loaded.config.inventory).toBe('sites/lab.yaml')
      expect(loaded.config.timeouts).toEqual({ ...DEFAULT_CONFIG.timeouts, commit: 300000 })
      expect(loaded.config.concurrency).toBe(8)
      expect(loaded.config.intended).toEqual({ dir: 'intended', filename: '{name}.cfg' })
      expect(loaded.config.verify_facts).toBe(true)
    })

    it('should apply config.local.yaml overrides', () => {
      writeConfig(tempDir, 'credentials:\n  default_username: netops\n')
      writeConfig(tempDir, 'credentials:\n  default_password: test-secret\n', 'config.local.yaml')

      const { config } = loadConfig(tempDir)

      expect(config.credentials).toEqual({ default_username: 'netops', default_password: 'test-secret' })
    })

    it('should expand environment variables', () => {
      process.env.NETDEPLOY_TEST_PASSWORD = 'test-secret'
      writeConfig(tempDir, 'credentials:\n  default_password: ${NETDEPLOY_TEST_PASSWORD}\n')

      expect(loadConfig(tempDir).config.credentials.default_password).toBe('test-secret')
    })

    it('should accept an empty file', () => {
      writeConfig(tempDir, '')

      expect(loadConfig(tempDir).config).toEqual(DEFAULT_CONFIG)
    })

    it('should throw ConfigNotFoundError without a config', () => {
      expect(() => loadConfig(tempDir)).toThrow(ConfigNotFoundError)
    })

    it('should reject a config that is not a mapping', () => {
      writeConfig(tempDir, '- just\n- a list\n')

      expect(() => loadConfig(tempDir)).toThrow(InvalidConfigError)
    })
  })

  describe('normalizeConfig', () => {
    const base = {
      ...DEFAULT_CONFIG,
      intended: { ...DEFAULT_CONFIG.intended },
      credentials: { ...DEFAULT_CONFIG.credentials },
      timeouts: { ...DEFAULT_CONFIG.timeouts }
    }

    it('should accept numeric strings for timeouts', () => {
      const config = normalizeConfig({ ...base, timeouts: { ...base.timeouts, open: '5000' } })

      expect(config.timeouts.open).toBe(5000)
    })

    it('should reject negative timeouts', () => {
      expect(() => normalizeConfig({ ...base, timeouts: { ...base.timeouts, diff: -1 } }))
        .toThrow('Invalid config: "timeouts.diff" must be a non-negative number')
    })

    it('should reject a zero concurrency', () => {
      expect(() => normalizeConfig({ ...base, concurrency: 0 }))
        .toThrow('Invalid config: "concurrency" must be a positive integer')
    })

    it('should reject unsupported versions', () => {
      expect(() => normalizeConfig({ ...base, version: 2 }, 'config.yaml'))
        .toThrow('Invalid config in config.yaml: unsupported version "2"')
    })

    it('should parse boolean strings', () => {
      expect(normalizeConfig({ ...base, verify_facts: 'false' }).verify_facts).toBe(false)
    })
  })

  describe('expandEnvVars', () => {
    const env = { USER_NAME: 'netops' }

    it('should expand the supported forms', () => {
      expect(expandEnvVars('${USER_NAME}', env)).toBe('netops')
      expect(expandEnvVars('$USER_NAME', env)).toBe('netops')
      expect(expandEnvVars('${MISSING:-admin}', env)).toBe('admin')
      expect(expandEnvVars('${MISSING}', env)).toBe('')
    })
  })

  describe('resolveConfigPath', () => {
    it('should resolve relative to the config directory', () => {
      expect(resolveConfigPath('/srv/lab/.netdeploy', 'intended')).toBe(path.resolve('/srv/lab/.netdeploy/intended'))
      expect(resolveConfigPath('/srv/lab/.netdeploy', '/etc/netdeploy/inventory.yaml'))
        .toBe(path.resolve('/etc/netdeploy/inventory.yaml'))
    })
  })
})
