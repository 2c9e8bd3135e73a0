import { InvalidArgumentError } from 'commander'
import type { RuckusOneClient } from '../client/ruckus-one.ts'
import { ConfigurationError } from '../core/errors.ts'
import type { TJsonValue } from '../core/types.ts'
import type { TOutputFormat } from './output.ts'

export type TGlobalOptions = {
  config?: string
  region?: string
  clientId?: string
  clientSecret?: string
  tenantId?: string
  output: TOutputFormat
  fields?: string
  verbose?: boolean
}

/** What every command group needs: a lazily built client and a printer honouring --output. */
export type TCliContext = {
  getClient(): RuckusOneClient
  print(data: unknown): void
}

export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.')
  return parsed
}

export function parseJsonOption(value: string, name: string): TJsonValue {
  try {
    return JSON.parse(value)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`${name} is not valid JSON: ${reason}`)
  }
}

export function parseJsonObject(value: string, name: string): { [key: string]: TJsonValue } {
  const parsed = parseJsonOption(value, name)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${name} must be a JSON object`)
  }
  return parsed
}

/** Parses `k=v,k2=v2` into query parameters. */
export function parseQueryList(value: string): Record<string, string> {
  const params: Record<string, string> = {}
  for (const pair of value.split(',')) {
    const trimmed = pair.trim()
    if (!trimmed) continue
    const separator = trimmed.indexOf('=')
    if (separator <= 0) {
      throw new ConfigurationError(`Invalid query parameter "${trimmed}", expected key=value`)
    }
    params[trimmed.slice(0, separator)] = trimmed.slice(separator + 1)
  }
  return params
}
