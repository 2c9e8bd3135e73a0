import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import type { TJsonValue, TQueryParams } from '../../core/types.ts'
import type { TIdentity, TIdentityDevice, TJsonObject } from '../../types/api.ts'
import { normalizeMac } from './validation.ts'

export type TIdentitiesApiOptions = {
  gateway: ApiGateway
}

export type TIdentityListOptions = {
  page?: number
  /** @default 20 */
  pageSize?: number
  /** Extra query-string parameters */
  params?: TQueryParams
}

export type TIdentityQuery = {
  page?: number
  /** @default 20 */
  pageSize?: number
  dpskPoolId?: string
  ethernetPort?: string
  filter?: TJsonValue
  sort?: TJsonValue
  [key: string]: unknown
}

export type TAddDeviceOptions = {
  name?: string
  description?: string
  [key: string]: unknown
}

export type TIdentityExportOptions = {
  dpskPoolId?: string
  filter?: TJsonValue
  [key: string]: unknown
}

/** Identities across all identity groups, and the devices bound to each identity. */
export interface TIdentitiesApi {
  list(options?: TIdentityListOptions): Promise<TJsonObject>
  query(query?: TIdentityQuery): Promise<TJsonObject>
  get(groupId: string, identityId: string): Promise<TIdentity>
  update(groupId: string, identityId: string, changes: TJsonObject): Promise<TIdentity>
  delete(groupId: string, identityId: string): Promise<void>
  listDevices(groupId: string, identityId: string): Promise<TIdentityDevice[]>
  addDevice(
    groupId: string,
    identityId: string,
    macAddress: string,
    options?: TAddDeviceOptions,
  ): Promise<TJsonObject | undefined>
  removeDevice(groupId: string, identityId: string, macAddress: string): Promise<void>
  exportCsv(options?: TIdentityExportOptions): Promise<Uint8Array>
  importCsv(groupId: string, csv: string | Uint8Array): Promise<TJsonObject | undefined>
}

function identityPath(groupId: string, identityId: string): string {
  return `/identityGroups/${encodeURIComponent(groupId)}/identities/${encodeURIComponent(identityId)}`
}

function identityRef(groupId: string, identityId: string): TResourceRef {
  return { kind: 'Identity', id: identityId, parent: { kind: 'group', id: groupId } }
}

function withoutEmpty(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined && value !== ''),
  )
}

export class IdentitiesApi implements TIdentitiesApi {
  private gateway: ApiGateway

  constructor(options: TIdentitiesApiOptions) {
    this.gateway = options.gateway
  }

  public async list(options: TIdentityListOptions = {}): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>('/identities', {
      params: { page: options.page ?? 0, size: options.pageSize ?? 20, ...options.params },
    })
  }

  public async query(query: TIdentityQuery = {}): Promise<TJsonObject> {
    const { page, pageSize, ...filters } = query
    return await this.gateway.post<TJsonObject>('/identities/query', {
      page: page ?? 0,
      size: pageSize ?? 20,
      ...withoutEmpty(filters),
    })
  }

  public async get(groupId: string, identityId: string): Promise<TIdentity> {
    return await this.gateway.get<TIdentity>(identityPath(groupId, identityId), {
      resource: identityRef(groupId, identityId),
    })
  }

  public async update(
    groupId: string,
    identityId: string,
    changes: TJsonObject,
  ): Promise<TIdentity> {
    return await this.gateway.patch<TIdentity>(identityPath(groupId, identityId), changes, {
      resource: identityRef(groupId, identityId),
    })
  }

  public async delete(groupId: string, identityId: string): Promise<void> {
    await this.gateway.delete(identityPath(groupId, identityId), {
      resource: identityRef(groupId, identityId),
    })
  }

  /** Devices come from the identity details; there is no separate device listing. */
  public async listDevices(groupId: string, identityId: string): Promise<TIdentityDevice[]> {
    const identity = await this.get(groupId, identityId)
    return identity.devices ?? []
  }

  public async addDevice(
    groupId: string,
    identityId: string,
    macAddress: string,
    options: TAddDeviceOptions = {},
  ): Promise<TJsonObject | undefined> {
    const device = { macAddress: normalizeMac(macAddress), ...withoutEmpty(options) }
    return await this.gateway.post<TJsonObject | undefined>(
      `${identityPath(groupId, identityId)}/devices`,
      [device],
      { resource: identityRef(groupId, identityId) },
    )
  }

  public async removeDevice(
    groupId: string,
    identityId: string,
    macAddress: string,
  ): Promise<void> {
    await this.gateway.delete(
      `${identityPath(groupId, identityId)}/devices/${encodeURIComponent(macAddress)}`,
      { resource: identityRef(groupId, identityId) },
    )
  }

  public async exportCsv(options: TIdentityExportOptions = {}): Promise<Uint8Array> {
    const response = await this.gateway.request('POST', '/identities/csvFile', {
      json: withoutEmpty(options),
      rawResponse: true,
    })
    return await this.gateway.readBytes(response)
  }

  public async importCsv(
    groupId: string,
    csv: string | Uint8Array,
  ): Promise<TJsonObject | undefined> {
    const formData = new FormData()
    formData.append('file', new Blob([csv], { type: 'text/csv' }), 'identities.csv')
    return await this.gateway.post<TJsonObject | undefined>(
      `/identityGroups/${encodeURIComponent(groupId)}/identities/csvFile`,
      undefined,
      { formData, resource: { kind: 'Identity group', id: groupId } },
    )
  }
}
