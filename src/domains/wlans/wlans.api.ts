import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import { buildListQuery, type TListOptions } from '../../core/query.ts'
import type { TJsonObject, TPage, TWlan } from '../../types/api.ts'

export type TWlansApiOptions = {
  gateway: ApiGateway
}

export type TCreateWlanInput = {
  name: string
  ssid: string
  securityType: string
  hidden?: boolean
  vlanId?: number
  description?: string
  [key: string]: unknown
}

export type TVenueWlansOptions = {
  pageSize?: number
  page?: number
  searchString?: string
  /** Extra filters merged next to the venue filter */
  filters?: Record<string, unknown>
}

export type TDeployOptions = {
  apGroupId?: string
  [key: string]: unknown
}

export interface TWlansApi {
  list(options?: TListOptions): Promise<TPage<TWlan>>
  get(wlanId: string): Promise<TWlan>
  create(input: TCreateWlanInput): Promise<TWlan>
  update(wlanId: string, changes: TJsonObject): Promise<TWlan>
  delete(wlanId: string): Promise<void>
  listForVenue(venueId: string, options?: TVenueWlansOptions): Promise<TPage<TWlan>>
  deployToVenue(wlanId: string, venueId: string, options?: TDeployOptions): Promise<TJsonObject>
  undeployFromVenue(wlanId: string, venueId: string, apGroupId?: string): Promise<void>
  getVenueSettings(wlanId: string, venueId: string, apGroupId?: string): Promise<TJsonObject>
  updateVenueSettings(
    wlanId: string,
    venueId: string,
    settings: TJsonObject,
    apGroupId?: string,
  ): Promise<TJsonObject>
}

function wlanRef(wlanId: string): TResourceRef {
  return { kind: 'WLAN', id: wlanId }
}

function deploymentPath(venueId: string, wlanId: string): string {
  return `/venues/${encodeURIComponent(venueId)}/networks/${encodeURIComponent(wlanId)}`
}

function deploymentRef(wlanId: string, venueId: string): TResourceRef {
  return { kind: 'WLAN', id: wlanId, parent: { kind: 'venue', id: venueId } }
}

export class WlansApi implements TWlansApi {
  private gateway: ApiGateway

  constructor(options: TWlansApiOptions) {
    this.gateway = options.gateway
  }

  public async list(options?: TListOptions): Promise<TPage<TWlan>> {
    return await this.gateway.post<TPage<TWlan>>('/wifiNetworks/query', buildListQuery(options))
  }

  public async get(wlanId: string): Promise<TWlan> {
    return await this.gateway.get<TWlan>(`/wifiNetworks/${encodeURIComponent(wlanId)}`, {
      resource: wlanRef(wlanId),
    })
  }

  public async create(input: TCreateWlanInput): Promise<TWlan> {
    const { vlanId, description, ...rest } = input
    const body: Record<string, unknown> = { hidden: false, ...rest }
    if (vlanId !== undefined) body.vlanId = vlanId
    if (description) body.description = description
    return await this.gateway.post<TWlan>('/wifiNetworks', body)
  }

  public async update(wlanId: string, changes: TJsonObject): Promise<TWlan> {
    return await this.gateway.put<TWlan>(`/wifiNetworks/${encodeURIComponent(wlanId)}`, changes, {
      resource: wlanRef(wlanId),
    })
  }

  public async delete(wlanId: string): Promise<void> {
    await this.gateway.delete(`/wifiNetworks/${encodeURIComponent(wlanId)}`, {
      resource: wlanRef(wlanId),
    })
  }

  public async listForVenue(
    venueId: string,
    options: TVenueWlansOptions = {},
  ): Promise<TPage<TWlan>> {
    const body: Record<string, unknown> = {
      pageSize: options.pageSize ?? 100,
      page: options.page ?? 0,
      filters: { venueId, ...options.filters },
    }
    if (options.searchString) body.searchString = options.searchString
    return await this.gateway.post<TPage<TWlan>>('/venues/networks/query', body, {
      resource: { kind: 'Venue', id: venueId },
    })
  }

  public async deployToVenue(
    wlanId: string,
    venueId: string,
    options: TDeployOptions = {},
  ): Promise<TJsonObject> {
    const { apGroupId, ...rest } = options
    const body: Record<string, unknown> = { wifiNetworkId: wlanId, ...rest }
    if (apGroupId) body.apGroupId = apGroupId
    return await this.gateway.post<TJsonObject>(
      `/venues/${encodeURIComponent(venueId)}/networks`,
      body,
      { resource: deploymentRef(wlanId, venueId) },
    )
  }

  public async undeployFromVenue(
    wlanId: string,
    venueId: string,
    apGroupId?: string,
  ): Promise<void> {
    await this.gateway.delete(deploymentPath(venueId, wlanId), {
      params: { apGroupId },
      resource: deploymentRef(wlanId, venueId),
    })
  }

  public async getVenueSettings(
    wlanId: string,
    venueId: string,
    apGroupId?: string,
  ): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(deploymentPath(venueId, wlanId), {
      params: { apGroupId },
      resource: deploymentRef(wlanId, venueId),
    })
  }

  public async updateVenueSettings(
    wlanId: string,
    venueId: string,
    settings: TJsonObject,
    apGroupId?: string,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(deploymentPath(venueId, wlanId), settings, {
      params: { apGroupId },
      resource: deploymentRef(wlanId, venueId),
    })
  }
}
