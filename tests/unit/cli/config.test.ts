import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadFileConfig, resolveCredentials } from '../../../src/cli/config.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'

describe('CLI configuration', () => {
  let dir: string

  const writeConfig = (name: string, content: string): string => {
    const path = join(dir, name)
    writeFileSync(path, content)
    return path
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ruckus-one-cli-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('loadFileConfig', () => {
    it('reads string credentials and ignores other values', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({
          credentials: { clientId: 'file-client', tenantId: 42, region: 'eu', extra: 'x' },
        }),
      )

      expect(loadFileConfig(path)).toEqual({
        credentials: { clientId: 'file-client', region: 'eu' },
      })
    })

    it('returns no credentials when the section is missing', () => {
      const path = writeConfig('config.json', '{"settings":{}}')
      expect(loadFileConfig(path)).toEqual({ credentials: {} })
    })

    it('throws ConfigurationError for a missing file', () => {
      const path = join(dir, 'absent.json')
      expect(() => loadFileConfig(path)).toThrow(`Config file not found: ${path}`)
    })

    it('throws ConfigurationError for invalid JSON', () => {
      const path = writeConfig('broken.json', '{credentials')
      expect(() => loadFileConfig(path)).toThrow(ConfigurationError)
      expect(() => loadFileConfig(path)).toThrow(`Config file ${path} is not valid JSON`)
    })
  })

  describe('resolveCredentials', () => {
    const fullEnv = {
      RUCKUS_API_CLIENT_ID: 'env-client',
      RUCKUS_API_CLIENT_SECRET: 'env-secret',
      RUCKUS_API_TENANT_ID: 'env-tenant',
    }

    it('reads the environment and defaults the region to na', () => {
      expect(resolveCredentials({}, fullEnv)).toEqual({
        clientId: 'env-client',
        clientSecret: 'env-secret',
        tenantId: 'env-tenant',
        region: 'na',
      })
    })

    it('prefers flags over the environment', () => {
      const credentials = resolveCredentials(
        { clientId: 'flag-client', region: 'asia' },
        { ...fullEnv, RUCKUS_API_REGION: 'eu' },
      )
      expect(credentials.clientId).toBe('flag-client')
      expect(credentials.clientSecret).toBe('env-secret')
      expect(credentials.region).toBe('asia')
    })

    it('prefers the environment over the config file', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({
          credentials: {
            clientId: 'file-client',
            clientSecret: 'file-secret',
            tenantId: 'file-tenant',
            region: 'eu',
          },
        }),
      )

      expect(
        resolveCredentials({ config: path }, { RUCKUS_API_CLIENT_ID: 'env-client' }),
      ).toEqual({
        clientId: 'env-client',
        clientSecret: 'file-secret',
        tenantId: 'file-tenant',
        region: 'eu',
      })
    })

    it('finds the config file through RUCKUS_CONFIG_FILE', () => {
      const path = writeConfig(
        'config.json',
        JSON.stringify({ credentials: { tenantId: 'file-tenant' } }),
      )

      const credentials = resolveCredentials(
        {},
        {
          RUCKUS_API_CLIENT_ID: 'env-client',
          RUCKUS_API_CLIENT_SECRET: 'env-secret',
          RUCKUS_CONFIG_FILE: path,
        },
      )
      expect(credentials.tenantId).toBe('file-tenant')
    })

    it('names every source of a missing field', () => {
      expect(() => resolveCredentials({}, { RUCKUS_API_CLIENT_ID: 'env-client' })).toThrow(
        'Missing client secret. Set --client-secret, RUCKUS_API_CLIENT_SECRET, ' +
          'or credentials.clientSecret in the config file',
      )
    })

    it('treats empty values as missing', () => {
      expect(() => resolveCredentials({ clientId: '' }, { RUCKUS_API_CLIENT_ID: '' })).toThrow(
        'Missing client ID',
      )
    })
  })
})
