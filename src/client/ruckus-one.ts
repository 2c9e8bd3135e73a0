import { ApiGateway } from '../core/api-gateway.ts'
import type {
  TCredentials,
  TDecodedBody,
  THttpMethod,
  TRawRequestOptions,
  TRequestOptions,
} from '../core/types.ts'
import { AccessPointsApi } from '../domains/access-points/access-points.api.ts'
import { TokenAuthority } from '../domains/auth/token-authority.ts'
import { DpskApi } from '../domains/dpsk/dpsk.api.ts'
import { IdentitiesApi } from '../domains/identities/identities.api.ts'
import { IdentityGroupsApi } from '../domains/identity-groups/identity-groups.api.ts'
import { SwitchesApi } from '../domains/switches/switches.api.ts'
import { VenuesApi } from '../domains/venues/venues.api.ts'
import { VlansApi } from '../domains/vlans/vlans.api.ts'
import { WlansApi } from '../domains/wlans/wlans.api.ts'
import { RegionEndpoint } from '../providers/endpoint/region-endpoint.ts'

export type TRuckusOneClientOptions = TCredentials & {
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
  /** Transport timeout per HTTP call @default 30000 */
  timeoutMs?: number
}

/**
 * RUCKUS One API client. One token authority and one gateway are shared by every
 * resource module.
 *
 * @example
 * ```typescript
 * const client = new RuckusOneClient({
 *   clientId: 'my-client-id',
 *   clientSecret: 'my-client-secret',
 *   tenantId: 'my-tenant-id',
 *   region: 'eu',
 * })
 *
 * const venues = await client.venues.list({ pageSize: 10 })
 * ```
 */
export class RuckusOneClient {
  public readonly auth: TokenAuthority
  public readonly gateway: ApiGateway

  public readonly venues: VenuesApi
  public readonly accessPoints: AccessPointsApi
  public readonly switches: SwitchesApi
  public readonly wlans: WlansApi
  public readonly vlans: VlansApi
  public readonly dpsk: DpskApi
  public readonly identityGroups: IdentityGroupsApi
  public readonly identities: IdentitiesApi

  constructor(options: TRuckusOneClientOptions) {
    this.auth = new TokenAuthority(options)
    this.gateway = new ApiGateway({
      endpointProvider: new RegionEndpoint({ region: options.region }),
      tokenProvider: this.auth,
      fetchImplementation: options.fetchImplementation,
      timeoutMs: options.timeoutMs,
    })

    const gateway = this.gateway
    this.venues = new VenuesApi({ gateway })
    this.accessPoints = new AccessPointsApi({ gateway })
    this.switches = new SwitchesApi({ gateway })
    this.wlans = new WlansApi({ gateway })
    this.vlans = new VlansApi({ gateway })
    this.dpsk = new DpskApi({ gateway })
    this.identityGroups = new IdentityGroupsApi({ gateway })
    this.identities = new IdentitiesApi({ gateway })
  }

  public request(method: THttpMethod, path: string, options: TRawRequestOptions): Promise<Response>
  public request<TResponse = TDecodedBody>(
    method: THttpMethod,
    path: string,
    options?: TRequestOptions & { rawResponse?: false },
  ): Promise<TResponse>
  public request(
    method: THttpMethod,
    path: string,
    options: TRequestOptions & { rawResponse?: boolean } = {},
  ): Promise<unknown> {
    if (options.rawResponse) {
      return this.gateway.request(method, path, { ...options, rawResponse: true })
    }
    return this.gateway.request(method, path, { ...options, rawResponse: false })
  }

  public get<TResponse = TDecodedBody>(
    path: string,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.gateway.get<TResponse>(path, options)
  }

  public post<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.gateway.post<TResponse>(path, json, options)
  }

  public put<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.gateway.put<TResponse>(path, json, options)
  }

  public patch<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.gateway.patch<TResponse>(path, json, options)
  }

  public delete<TResponse = TDecodedBody>(
    path: string,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.gateway.delete<TResponse>(path, options)
  }
}
