import { ConfigurationError, type TErrorDetail } from './errors.ts'
import type { TJsonValue, TQueryParams } from './types.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

/** Joins a base URL and an API path; leading slashes on the path are ignored. */
export function joinUrl(baseUrl: string, path: string, params?: TQueryParams): URL {
  const url = new URL(path.replace(/^\/+/, ''), `${normalizeBaseUrl(baseUrl)}/`)
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value))
    }
  }
  return url
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved: typeof fetch | undefined = override ?? globalThis.fetch
  if (typeof resolved !== 'function') {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

/** True for application/json and structured-syntax variants such as application/vnd.foo+json. */
export function isJsonContentType(contentType: string | null): boolean {
  if (!contentType) return false
  const mediaType = contentType.split(';')[0]?.trim().toLowerCase() ?? ''
  return mediaType === 'application/json' || mediaType.endsWith('+json')
}

function isJsonObject(value: TJsonValue): value is { [key: string]: TJsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Pulls a human-readable detail out of an error body: `message`, then `error`, then the
 * whole decoded body. Falls back to the raw text when the body is not valid JSON.
 */
export function extractErrorDetail(text: string, contentType: string | null): TErrorDetail {
  if (!text) return undefined
  if (!isJsonContentType(contentType)) return text

  let parsed: TJsonValue
  try {
    parsed = JSON.parse(text)
  } catch {
    return text
  }

  if (isJsonObject(parsed)) {
    return parsed.message || parsed.error || parsed
  }
  return parsed
}

export function createTimeoutSignal(timeoutMs: number): {
  signal: AbortSignal
  cleanup: () => void
} {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  return { signal: controller.signal, cleanup: () => clearTimeout(timeoutId) }
}

/** Issues a fetch that is aborted once `timeoutMs` elapses before the response headers arrive. */
export async function fetchWithTimeout(
  fetchImplementation: typeof fetch,
  url: URL | string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const { signal, cleanup } = createTimeoutSignal(timeoutMs)
  try {
    return await fetchImplementation(url, { ...init, signal })
  } finally {
    cleanup()
  }
}

export function describeTransportFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'AbortError') {
    return `request timed out after ${timeoutMs}ms`
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : ''
    return `${error.message}${cause}`
  }
  return String(error)
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    if (!options[key] || typeof options[key] !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function validatePositiveNumber(value: number | undefined, name: string): void {
  if (value === undefined) return
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`)
  }
}
