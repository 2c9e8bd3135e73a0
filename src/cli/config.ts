import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { config as loadEnv } from 'dotenv'
import { ConfigurationError } from '../core/errors.ts'
import type { TCredentials } from '../core/types.ts'
import { DEFAULT_REGION } from '../providers/endpoint/region-endpoint.ts'

export type TCredentialFlags = {
  config?: string
  region?: string
  clientId?: string
  clientSecret?: string
  tenantId?: string
}

type TCredentialKey = 'clientId' | 'clientSecret' | 'tenantId' | 'region'

export type TFileConfig = {
  credentials: Partial<Record<TCredentialKey, string>>
}

type TEnv = Record<string, string | undefined>

const CREDENTIAL_KEYS: TCredentialKey[] = ['clientId', 'clientSecret', 'tenantId', 'region']

const ENV_KEYS: Record<TCredentialKey, string> = {
  clientId: 'RUCKUS_API_CLIENT_ID',
  clientSecret: 'RUCKUS_API_CLIENT_SECRET',
  tenantId: 'RUCKUS_API_TENANT_ID',
  region: 'RUCKUS_API_REGION',
}

const FLAGS: Record<TCredentialKey, string> = {
  clientId: '--client-id',
  clientSecret: '--client-secret',
  tenantId: '--tenant-id',
  region: '--region',
}

const LABELS: Record<Exclude<TCredentialKey, 'region'>, string> = {
  clientId: 'client ID',
  clientSecret: 'client secret',
  tenantId: 'tenant ID',
}

export const CONFIG_FILE_ENV = 'RUCKUS_CONFIG_FILE'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Loads `.env` from the working directory into process.env without overriding set variables. */
export function loadDotenv(path?: string): void {
  loadEnv(path ? { path } : undefined)
}

/** Reads `{ "credentials": { ... } }` from a JSON file. Non-string values are ignored. */
export function loadFileConfig(path: string): TFileConfig {
  const fullPath = resolve(path)
  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Config file not found: ${fullPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Config file ${fullPath} is not valid JSON: ${reason}`)
  }

  const credentials: TFileConfig['credentials'] = {}
  const section = isRecord(parsed) ? parsed.credentials : undefined
  if (isRecord(section)) {
    for (const key of CREDENTIAL_KEYS) {
      const value = section[key]
      if (typeof value === 'string' && value) credentials[key] = value
    }
  }
  return { credentials }
}

/**
 * Resolves each credential field from, in order: flags, environment, config file.
 * The region falls back to "na".
 */
export function resolveCredentials(flags: TCredentialFlags, env: TEnv = process.env): TCredentials {
  const configPath = flags.config || env[CONFIG_FILE_ENV]
  const file = configPath ? loadFileConfig(configPath).credentials : {}

  const pick = (key: TCredentialKey): string | undefined =>
    flags[key] || env[ENV_KEYS[key]] || file[key] || undefined

  const required = (key: Exclude<TCredentialKey, 'region'>): string => {
    const value = pick(key)
    if (!value) {
      throw new ConfigurationError(
        `Missing ${LABELS[key]}. Set ${FLAGS[key]}, ${ENV_KEYS[key]}, or credentials.${key} in the config file`,
      )
    }
    return value
  }

  return {
    clientId: required('clientId'),
    clientSecret: required('clientSecret'),
    tenantId: required('tenantId'),
    region: pick('region') ?? DEFAULT_REGION,
  }
}
