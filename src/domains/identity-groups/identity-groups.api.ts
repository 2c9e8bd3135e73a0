import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import type { TIdentity, TIdentityDevice, TIdentityGroup, TJsonObject } from '../../types/api.ts'
import { assertVlan } from '../identities/validation.ts'

export type TIdentityGroupsApiOptions = {
  gateway: ApiGateway
}

export type TIdentityGroupQuery = {
  page?: number
  /** @default 20 */
  pageSize?: number
  certificateTemplateId?: string
  dpskPoolId?: string
  policySetId?: string
  propertyId?: string
  [key: string]: unknown
}

export type TCreateIdentityGroupInput = {
  name: string
  description?: string
  dpskPoolId?: string
  certificateTemplateId?: string
  policySetId?: string
  propertyId?: string
  [key: string]: unknown
}

export type TCreateIdentityInput = {
  name: string
  email?: string
  description?: string
  expirationDate?: string
  /** Validated to 1-4094 before the request is sent */
  vlan?: number
  devices?: TIdentityDevice[]
  [key: string]: unknown
}

export interface TIdentityGroupsApi {
  list(): Promise<TJsonObject>
  query(query?: TIdentityGroupQuery): Promise<TJsonObject>
  get(groupId: string): Promise<TIdentityGroup>
  create(input: TCreateIdentityGroupInput): Promise<TIdentityGroup>
  update(groupId: string, changes: TJsonObject): Promise<TIdentityGroup>
  delete(groupId: string): Promise<void>
  associateDpskPool(groupId: string, dpskPoolId: string): Promise<TJsonObject | undefined>
  associatePolicySet(groupId: string, policySetId: string): Promise<TJsonObject | undefined>
  getIdentity(groupId: string, identityId: string): Promise<TIdentity>
  createIdentity(groupId: string, input: TCreateIdentityInput): Promise<TIdentity>
}

/** Drops keys whose value is undefined or an empty string. */
function definedEntries(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined && value !== ''),
  )
}

function groupPath(groupId: string): string {
  return `/identityGroups/${encodeURIComponent(groupId)}`
}

function groupRef(groupId: string): TResourceRef {
  return { kind: 'Identity group', id: groupId }
}

export class IdentityGroupsApi implements TIdentityGroupsApi {
  private gateway: ApiGateway

  constructor(options: TIdentityGroupsApiOptions) {
    this.gateway = options.gateway
  }

  public async list(): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>('/identityGroups')
  }

  public async query(query: TIdentityGroupQuery = {}): Promise<TJsonObject> {
    const { page, pageSize, ...filters } = query
    return await this.gateway.post<TJsonObject>('/identityGroups/query', {
      page: page ?? 0,
      size: pageSize ?? 20,
      ...definedEntries(filters),
    })
  }

  public async get(groupId: string): Promise<TIdentityGroup> {
    return await this.gateway.get<TIdentityGroup>(groupPath(groupId), {
      resource: groupRef(groupId),
    })
  }

  public async create(input: TCreateIdentityGroupInput): Promise<TIdentityGroup> {
    return await this.gateway.post<TIdentityGroup>('/identityGroups', definedEntries(input))
  }

  public async update(groupId: string, changes: TJsonObject): Promise<TIdentityGroup> {
    return await this.gateway.put<TIdentityGroup>(groupPath(groupId), changes, {
      resource: groupRef(groupId),
    })
  }

  public async delete(groupId: string): Promise<void> {
    await this.gateway.delete(groupPath(groupId), { resource: groupRef(groupId) })
  }

  public async associateDpskPool(
    groupId: string,
    dpskPoolId: string,
  ): Promise<TJsonObject | undefined> {
    return await this.gateway.put<TJsonObject | undefined>(
      `${groupPath(groupId)}/dpskPools/${encodeURIComponent(dpskPoolId)}`,
      undefined,
      { resource: groupRef(groupId) },
    )
  }

  public async associatePolicySet(
    groupId: string,
    policySetId: string,
  ): Promise<TJsonObject | undefined> {
    return await this.gateway.put<TJsonObject | undefined>(
      `${groupPath(groupId)}/policySets/${encodeURIComponent(policySetId)}`,
      undefined,
      { resource: groupRef(groupId) },
    )
  }

  public async getIdentity(groupId: string, identityId: string): Promise<TIdentity> {
    return await this.gateway.get<TIdentity>(
      `${groupPath(groupId)}/identities/${encodeURIComponent(identityId)}`,
      {
        resource: { kind: 'Identity', id: identityId, parent: { kind: 'group', id: groupId } },
      },
    )
  }

  public async createIdentity(groupId: string, input: TCreateIdentityInput): Promise<TIdentity> {
    if (input.vlan !== undefined) assertVlan(input.vlan)
    const body = definedEntries(input)
    if (Array.isArray(input.devices) && input.devices.length === 0) delete body.devices
    return await this.gateway.post<TIdentity>(`${groupPath(groupId)}/identities`, body, {
      resource: groupRef(groupId),
    })
  }
}
