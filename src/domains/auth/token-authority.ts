import { logger } from '../../core/logger.ts'
import type { TCredentials, TTokenProvider } from '../../core/types.ts'
import { validatePositiveNumber, validateRequiredStrings } from '../../core/utils.ts'
import { RegionEndpoint } from '../../providers/endpoint/region-endpoint.ts'
import { AuthApi, type TTokenExchange } from './auth.api.ts'

/** Tokens are treated as expired this long before the server-declared expiry. */
export const TOKEN_SAFETY_MARGIN_MS = 300_000

export type TTokenState = 'no_token' | 'valid' | 'expired'

export type TTokenAuthorityOptions = TCredentials & {
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
  /** Transport timeout for the token call @default 30000 */
  timeoutMs?: number
  /** Replaces the HTTP token exchange built from the credentials */
  tokenExchange?: TTokenExchange
}

type TCachedToken = {
  token: string
  expiresAtMs: number
}

/**
 * Owns the OAuth2 client-credentials token for one set of credentials.
 *
 * - Expiry is checked lazily on every `getValidToken()`; there are no timers
 * - The cached expiry sits 5 minutes ahead of the server-declared one
 * - Concurrent `getValidToken()` callers share a single in-flight exchange;
 *   `forceRefresh()` always starts its own
 * - A failed exchange leaves any previously cached token in place
 */
export class TokenAuthority implements TTokenProvider {
  private readonly tokenExchange: TTokenExchange
  private cachedToken: TCachedToken | null = null
  private pendingExchange: Promise<string> | null = null

  constructor(options: TTokenAuthorityOptions) {
    validateRequiredStrings(options, ['clientId', 'clientSecret', 'tenantId'])
    validatePositiveNumber(options.timeoutMs, 'timeoutMs')

    this.tokenExchange =
      options.tokenExchange ??
      new AuthApi({
        baseUrl: new RegionEndpoint({ region: options.region }).getApiBase(),
        tenantId: options.tenantId,
        clientId: options.clientId,
        clientSecret: options.clientSecret,
        fetchImplementation: options.fetchImplementation,
        timeoutMs: options.timeoutMs,
      })
  }

  /** Returns the cached token while it is unexpired, otherwise authenticates first. */
  async getValidToken(): Promise<string> {
    if (this.cachedToken && Date.now() < this.cachedToken.expiresAtMs) {
      return this.cachedToken.token
    }
    return await this.authenticate(false)
  }

  /** Authenticates regardless of the cache state and replaces the cached token. */
  async forceRefresh(): Promise<void> {
    await this.authenticate(true)
  }

  async getAuthHeaders(): Promise<Record<string, string>> {
    const token = await this.getValidToken()
    return {
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
    }
  }

  getState(): TTokenState {
    if (!this.cachedToken) return 'no_token'
    return Date.now() >= this.cachedToken.expiresAtMs ? 'expired' : 'valid'
  }

  /** Epoch milliseconds after which the cached token is no longer handed out. */
  getExpiresAt(): number | undefined {
    return this.cachedToken?.expiresAtMs
  }

  private authenticate(force: boolean): Promise<string> {
    if (this.pendingExchange && !force) return this.pendingExchange

    const exchange: Promise<string> = this.exchange().finally(() => {
      if (this.pendingExchange === exchange) this.pendingExchange = null
    })
    this.pendingExchange = exchange
    return exchange
  }

  private async exchange(): Promise<string> {
    const grant = await this.tokenExchange.requestToken()

    this.cachedToken = {
      token: grant.accessToken,
      expiresAtMs: Date.now() + grant.expiresIn * 1000 - TOKEN_SAFETY_MARGIN_MS,
    }
    logger.debug(`Obtained access token, expires in ${grant.expiresIn} seconds`)

    return this.cachedToken.token
  }
}
