import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig, ConfigError } from './loader.js'
import { DEFAULT_CONFIG } from './defaults.js'

describe('loadConfig', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cedula-test-'))
    configPath = join(tempDir, 'cedula.config.json')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('successful loading', () => {
    it('should return defaults when no file is given', () => {
      const config = loadConfig(undefined, {})
      expect(config.dgii.url).toBe('https://dgii.gov.do/wsMovilDGII/WSMovilDGII.asmx')
      expect(config.dgii.timeoutMs).toBe(30000)
    })

    it('should apply defaults for missing fields', () => {
      writeFileSync(configPath, JSON.stringify({ dgii: { url: 'http://localhost:8080/dgii' } }))
      const config = loadConfig(configPath, {})
      expect(config.dgii.url).toBe('http://localhost:8080/dgii')
      expect(config.dgii.timeoutMs).toBe(30000)
    })

    it('should accept an empty object', () => {
      writeFileSync(configPath, '{}')
      expect(loadConfig(configPath, {})).toEqual(DEFAULT_CONFIG)
    })

    it('should return a frozen config', () => {
      const config = loadConfig(undefined, {})
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.dgii)).toBe(true)
    })
  })

  describe('environment variable overrides', () => {
    it('should override nested config with double underscore (CEDULA_DGII__TIMEOUTMS)', () => {
      writeFileSync(configPath, '{}')
      const config = loadConfig(configPath, { CEDULA_DGII__TIMEOUTMS: '5000' })
      expect(config.dgii.timeoutMs).toBe(5000)
    })

    it('should keep non-numeric values as strings', () => {
      const config = loadConfig(undefined, { CEDULA_DGII__URL: 'http://127.0.0.1:9000/ws' })
      expect(config.dgii.url).toBe('http://127.0.0.1:9000/ws')
    })

    it('should take precedence over the file', () => {
      writeFileSync(configPath, JSON.stringify({ dgii: { timeoutMs: 10000 } }))
      const config = loadConfig(configPath, { CEDULA_DGII__TIMEOUTMS: '2000' })
      expect(config.dgii.timeoutMs).toBe(2000)
    })

    it('should ignore variables without the prefix', () => {
      const config = loadConfig(undefined, { DGII__TIMEOUTMS: '2000' })
      expect(config.dgii.timeoutMs).toBe(30000)
    })

    it('should not leak overrides into DEFAULT_CONFIG', () => {
      loadConfig(undefined, { CEDULA_DGII__TIMEOUTMS: '2000' })
      expect(DEFAULT_CONFIG.dgii.timeoutMs).toBe(30000)
    })
  })

  describe('validation errors', () => {
    it('should throw ConfigError for a missing file', () => {
      expect(() => loadConfig(join(tempDir, 'missing.json'), {})).toThrow(
        `Configuration file not found: ${join(tempDir, 'missing.json')}`,
      )
    })

    it('should throw ConfigError for invalid JSON', () => {
      writeFileSync(configPath, '{ not json')
      expect(() => loadConfig(configPath, {})).toThrow(ConfigError)
      expect(() => loadConfig(configPath, {})).toThrow('Invalid JSON')
    })

    it('should reject a JSON array', () => {
      writeFileSync(configPath, '[]')
      expect(() => loadConfig(configPath, {})).toThrow('must contain a JSON object')
    })

    it('should report field paths for schema violations', () => {
      writeFileSync(configPath, JSON.stringify({ dgii: { timeoutMs: 10 } }))
      try {
        loadConfig(configPath, {})
        expect.unreachable('loadConfig should have thrown')
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err
        expect(err.fields.map((f) => f.path)).toContain('/dgii/timeoutMs')
      }
    })

    it('should reject a fractional timeout', () => {
      writeFileSync(configPath, JSON.stringify({ dgii: { timeoutMs: 1500.5 } }))
      try {
        loadConfig(configPath, {})
        expect.unreachable('loadConfig should have thrown')
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err
        expect(err.fields.map((f) => f.path)).toContain('/dgii/timeoutMs')
      }
    })

    it('should reject a timeout above the 32-bit timer limit', () => {
      expect(() => loadConfig(undefined, { CEDULA_DGII__TIMEOUTMS: '5000000000' })).toThrow(ConfigError)
    })

    it('should accept the largest timer delay', () => {
      const config = loadConfig(undefined, { CEDULA_DGII__TIMEOUTMS: '4294967295' })
      expect(config.dgii.timeoutMs).toBe(4294967295)
    })

    it('should reject a wrongly typed env override', () => {
      expect(() => loadConfig(undefined, { CEDULA_DGII__TIMEOUTMS: 'soon' })).toThrow(ConfigError)
    })
  })
})
