import type { ApiGateway } from '../../core/api-gateway.ts'
import { buildListQuery, type TListOptions } from '../../core/query.ts'
import type { TResourceRef } from '../../core/errors.ts'
import type {
  TAccessPoint,
  TAddress,
  TJsonObject,
  TListQueryBody,
  TPage,
  TSwitch,
  TVenue,
  TWlan,
} from '../../types/api.ts'

export type TVenuesApiOptions = {
  gateway: ApiGateway
}

export type TCreateVenueInput = {
  name: string
  address: TAddress
  description?: string
  timezone?: string
  [key: string]: unknown
}

export interface TVenuesApi {
  list(options?: TListOptions): Promise<TPage<TVenue>>
  get(venueId: string): Promise<TVenue>
  create(input: TCreateVenueInput): Promise<TVenue>
  update(venueId: string, changes: TJsonObject): Promise<TVenue>
  delete(venueId: string): Promise<void>
  listAccessPoints(venueId: string): Promise<TAccessPoint[]>
  querySwitches(venueId: string, query?: Partial<TListQueryBody>): Promise<TPage<TSwitch>>
  queryWlans(venueId: string, query?: Partial<TListQueryBody>): Promise<TPage<TWlan>>
  queryClients(venueId: string, query?: Partial<TListQueryBody>): Promise<TPage<TJsonObject>>
}

function venueRef(venueId: string): TResourceRef {
  return { kind: 'Venue', id: venueId }
}

export class VenuesApi implements TVenuesApi {
  private gateway: ApiGateway

  constructor(options: TVenuesApiOptions) {
    this.gateway = options.gateway
  }

  public async list(options?: TListOptions): Promise<TPage<TVenue>> {
    return await this.gateway.post<TPage<TVenue>>('/venues/query', buildListQuery(options))
  }

  public async get(venueId: string): Promise<TVenue> {
    return await this.gateway.get<TVenue>(`/venues/${encodeURIComponent(venueId)}`, {
      resource: venueRef(venueId),
    })
  }

  public async create(input: TCreateVenueInput): Promise<TVenue> {
    const { description, timezone, ...rest } = input
    const body: Record<string, unknown> = { ...rest }
    if (description) body.description = description
    if (timezone) body.timezone = timezone
    return await this.gateway.post<TVenue>('/venues', body)
  }

  public async update(venueId: string, changes: TJsonObject): Promise<TVenue> {
    return await this.gateway.put<TVenue>(`/venues/${encodeURIComponent(venueId)}`, changes, {
      resource: venueRef(venueId),
    })
  }

  public async delete(venueId: string): Promise<void> {
    await this.gateway.delete(`/venues/${encodeURIComponent(venueId)}`, {
      resource: venueRef(venueId),
    })
  }

  public async listAccessPoints(venueId: string): Promise<TAccessPoint[]> {
    return await this.gateway.get<TAccessPoint[]>(`/venues/${encodeURIComponent(venueId)}/aps`, {
      resource: venueRef(venueId),
    })
  }

  public async querySwitches(
    venueId: string,
    query: Partial<TListQueryBody> = {},
  ): Promise<TPage<TSwitch>> {
    return await this.gateway.post<TPage<TSwitch>>(
      `/venues/${encodeURIComponent(venueId)}/switches/query`,
      query,
      { resource: venueRef(venueId) },
    )
  }

  public async queryWlans(
    venueId: string,
    query: Partial<TListQueryBody> = {},
  ): Promise<TPage<TWlan>> {
    return await this.gateway.post<TPage<TWlan>>(
      `/venues/${encodeURIComponent(venueId)}/wifiNetworks/query`,
      query,
      { resource: venueRef(venueId) },
    )
  }

  public async queryClients(
    venueId: string,
    query: Partial<TListQueryBody> = {},
  ): Promise<TPage<TJsonObject>> {
    return await this.gateway.post<TPage<TJsonObject>>(
      `/venues/${encodeURIComponent(venueId)}/clients/query`,
      query,
      { resource: venueRef(venueId) },
    )
  }
}
