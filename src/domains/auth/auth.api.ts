import { AuthenticationError } from '../../core/errors.ts'
import { logger } from '../../core/logger.ts'
import { USER_AGENT } from '../../core/sdk-info.ts'
import {
  describeTransportFailure,
  fetchWithTimeout,
  normalizeBaseUrl,
  resolveFetch,
} from '../../core/utils.ts'
import type { TTokenGrant, TTokenResponse } from '../../types/api.ts'

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_EXPIRES_IN_SECONDS = 3600

export type TAuthApiOptions = {
  /** Regional API base URL (e.g., https://api.ruckus.cloud) */
  baseUrl: string
  tenantId: string
  clientId: string
  clientSecret: string
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
  /** Transport timeout for the token call @default 30000 */
  timeoutMs?: number
}

/** Performs one client-credentials exchange. */
export type TTokenExchange = {
  requestToken(): Promise<TTokenGrant>
}

function isTokenResponse(body: unknown): body is Partial<TTokenResponse> {
  return typeof body === 'object' && body !== null && !Array.isArray(body)
}

/**
 * Low-level client for the OAuth2 token endpoint.
 * Handles POST /oauth2/token/{tenantId} with a form-encoded client-credentials grant.
 */
export class AuthApi implements TTokenExchange {
  private readonly tokenUrl: string
  private readonly clientId: string
  private readonly clientSecret: string
  private readonly fetchImpl: typeof fetch
  private readonly timeoutMs: number

  constructor(options: TAuthApiOptions) {
    this.tokenUrl = `${normalizeBaseUrl(options.baseUrl)}/oauth2/token/${encodeURIComponent(options.tenantId)}`
    this.clientId = options.clientId
    this.clientSecret = options.clientSecret
    this.fetchImpl = resolveFetch(options.fetchImplementation)
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async requestToken(): Promise<TTokenGrant> {
    logger.debug(`Authenticating at ${this.tokenUrl}`)

    let response: Response
    try {
      response = await fetchWithTimeout(
        this.fetchImpl,
        this.tokenUrl,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
            'User-Agent': USER_AGENT,
          },
          body: new URLSearchParams({
            grant_type: 'client_credentials',
            client_id: this.clientId,
            client_secret: this.clientSecret,
          }).toString(),
        },
        this.timeoutMs,
      )
    } catch (error) {
      throw new AuthenticationError({
        message: `Authentication request failed: ${describeTransportFailure(error, this.timeoutMs)}`,
        cause: error,
      })
    }

    logger.debug(`Auth response status: ${response.status}`)
    let text: string
    try {
      text = await response.text()
    } catch (error) {
      throw new AuthenticationError({
        statusCode: response.status,
        message: `Authentication request failed: ${describeTransportFailure(error, this.timeoutMs)}`,
        cause: error,
      })
    }

    if (!response.ok) {
      throw new AuthenticationError({
        statusCode: response.status,
        detail: text || undefined,
        message: `Authentication failed with HTTP ${response.status}${text ? `: ${text}` : ''}`,
      })
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new AuthenticationError({
        statusCode: response.status,
        detail: text || undefined,
        message: 'Token response is not valid JSON',
        cause: error,
      })
    }

    if (!isTokenResponse(body) || typeof body.access_token !== 'string' || !body.access_token) {
      throw new AuthenticationError({
        statusCode: response.status,
        message: 'No access token in response',
      })
    }

    const expiresIn = body.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS
    if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn) || expiresIn <= 0) {
      throw new AuthenticationError({
        statusCode: response.status,
        message: 'Token response has invalid expires_in',
      })
    }

    return { accessToken: body.access_token, expiresIn, tokenType: body.token_type }
  }
}
