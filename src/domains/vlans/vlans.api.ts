import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import { buildListQuery, type TListOptions } from '../../core/query.ts'
import type { TJsonObject, TPage, TVlanPool, TVlanPoolProfile } from '../../types/api.ts'

export type TVlansApiOptions = {
  gateway: ApiGateway
}

export type TCreateVlanPoolInput = {
  name: string
  vlans: Array<number | string>
  description?: string
  [key: string]: unknown
}

export type TCreateVlanPoolProfileInput = {
  name: string
  vlanPoolId: string
  description?: string
  [key: string]: unknown
}

/** VLAN pools, VLAN pool profiles and AP management-traffic VLAN settings. */
export interface TVlansApi {
  listPools(options?: TListOptions): Promise<TPage<TVlanPool>>
  getPool(poolId: string): Promise<TVlanPool>
  createPool(input: TCreateVlanPoolInput): Promise<TVlanPool>
  updatePool(poolId: string, changes: TJsonObject): Promise<TVlanPool>
  deletePool(poolId: string): Promise<void>
  listProfiles(options?: TListOptions): Promise<TPage<TVlanPoolProfile>>
  getProfile(profileId: string): Promise<TVlanPoolProfile>
  createProfile(input: TCreateVlanPoolProfileInput): Promise<TVlanPoolProfile>
  updateProfile(profileId: string, changes: TJsonObject): Promise<TVlanPoolProfile>
  deleteProfile(profileId: string): Promise<void>
  getVenueApManagementVlan(venueId: string): Promise<TJsonObject>
  updateVenueApManagementVlan(venueId: string, settings: TJsonObject): Promise<TJsonObject>
  getApManagementVlan(venueId: string, serialNumber: string): Promise<TJsonObject>
  updateApManagementVlan(
    venueId: string,
    serialNumber: string,
    settings: TJsonObject,
  ): Promise<TJsonObject>
}

function withDescription<T extends { description?: string }>(input: T): Record<string, unknown> {
  const { description, ...rest } = input
  return description ? { ...rest, description } : rest
}

function poolRef(poolId: string): TResourceRef {
  return { kind: 'VLAN pool', id: poolId }
}

function profileRef(profileId: string): TResourceRef {
  return { kind: 'VLAN pool profile', id: profileId }
}

function apManagementVlanPath(venueId: string, serialNumber: string): string {
  return `/venues/${encodeURIComponent(venueId)}/aps/${encodeURIComponent(serialNumber)}/managementTrafficVlanSettings`
}

export class VlansApi implements TVlansApi {
  private gateway: ApiGateway

  constructor(options: TVlansApiOptions) {
    this.gateway = options.gateway
  }

  public async listPools(options?: TListOptions): Promise<TPage<TVlanPool>> {
    return await this.gateway.post<TPage<TVlanPool>>('/vlanPools/query', buildListQuery(options))
  }

  public async getPool(poolId: string): Promise<TVlanPool> {
    return await this.gateway.get<TVlanPool>(`/vlanPools/${encodeURIComponent(poolId)}`, {
      resource: poolRef(poolId),
    })
  }

  public async createPool(input: TCreateVlanPoolInput): Promise<TVlanPool> {
    return await this.gateway.post<TVlanPool>('/vlanPools', withDescription(input))
  }

  public async updatePool(poolId: string, changes: TJsonObject): Promise<TVlanPool> {
    return await this.gateway.put<TVlanPool>(`/vlanPools/${encodeURIComponent(poolId)}`, changes, {
      resource: poolRef(poolId),
    })
  }

  public async deletePool(poolId: string): Promise<void> {
    await this.gateway.delete(`/vlanPools/${encodeURIComponent(poolId)}`, {
      resource: poolRef(poolId),
    })
  }

  public async listProfiles(options?: TListOptions): Promise<TPage<TVlanPoolProfile>> {
    return await this.gateway.post<TPage<TVlanPoolProfile>>(
      '/vlanPoolProfiles/query',
      buildListQuery(options),
    )
  }

  public async getProfile(profileId: string): Promise<TVlanPoolProfile> {
    return await this.gateway.get<TVlanPoolProfile>(
      `/vlanPoolProfiles/${encodeURIComponent(profileId)}`,
      { resource: profileRef(profileId) },
    )
  }

  public async createProfile(input: TCreateVlanPoolProfileInput): Promise<TVlanPoolProfile> {
    return await this.gateway.post<TVlanPoolProfile>('/vlanPoolProfiles', withDescription(input))
  }

  public async updateProfile(
    profileId: string,
    changes: TJsonObject,
  ): Promise<TVlanPoolProfile> {
    return await this.gateway.put<TVlanPoolProfile>(
      `/vlanPoolProfiles/${encodeURIComponent(profileId)}`,
      changes,
      { resource: profileRef(profileId) },
    )
  }

  public async deleteProfile(profileId: string): Promise<void> {
    await this.gateway.delete(`/vlanPoolProfiles/${encodeURIComponent(profileId)}`, {
      resource: profileRef(profileId),
    })
  }

  public async getVenueApManagementVlan(venueId: string): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(
      `/venues/${encodeURIComponent(venueId)}/apManagementTrafficVlanSettings`,
      { resource: { kind: 'Venue', id: venueId } },
    )
  }

  public async updateVenueApManagementVlan(
    venueId: string,
    settings: TJsonObject,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(
      `/venues/${encodeURIComponent(venueId)}/apManagementTrafficVlanSettings`,
      settings,
      { resource: { kind: 'Venue', id: venueId } },
    )
  }

  public async getApManagementVlan(venueId: string, serialNumber: string): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(apManagementVlanPath(venueId, serialNumber), {
      resource: { kind: 'AP', id: serialNumber, parent: { kind: 'venue', id: venueId } },
    })
  }

  public async updateApManagementVlan(
    venueId: string,
    serialNumber: string,
    settings: TJsonObject,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(
      apManagementVlanPath(venueId, serialNumber),
      settings,
      { resource: { kind: 'AP', id: serialNumber, parent: { kind: 'venue', id: venueId } } },
    )
  }
}
