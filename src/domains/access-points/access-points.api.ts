import type { ApiGateway } from '../../core/api-gateway.ts'
import { ResourceNotFoundError, type TResourceRef } from '../../core/errors.ts'
import { buildListQuery, type TListOptions } from '../../core/query.ts'
import type { TAccessPoint, TJsonObject, TListQueryBody, TPage } from '../../types/api.ts'

export type TAccessPointsApiOptions = {
  gateway: ApiGateway
}

export interface TAccessPointsApi {
  list(options?: TListOptions): Promise<TPage<TAccessPoint>>
  get(apId: string): Promise<TAccessPoint>
  update(
    venueId: string,
    serialNumber: string,
    changes: TJsonObject,
  ): Promise<TJsonObject>
  reboot(venueId: string, serialNumber: string): Promise<TJsonObject | undefined>
  queryClients(
    serialNumber?: string,
    query?: Partial<TListQueryBody>,
  ): Promise<TPage<TJsonObject>>
  getRadioSettings(venueId: string, serialNumber: string): Promise<TJsonObject>
  updateRadioSettings(
    venueId: string,
    serialNumber: string,
    settings: TJsonObject,
  ): Promise<TJsonObject>
  getStatistics(venueId: string, serialNumber: string): Promise<TJsonObject>
  addToGroup(venueId: string, apGroupId: string, serialNumbers: string[]): Promise<TJsonObject>
}

function apRef(venueId: string, serialNumber: string): TResourceRef {
  return { kind: 'AP', id: serialNumber, parent: { kind: 'venue', id: venueId } }
}

function apPath(venueId: string, serialNumber: string): string {
  return `/venues/${encodeURIComponent(venueId)}/aps/${encodeURIComponent(serialNumber)}`
}

export class AccessPointsApi implements TAccessPointsApi {
  private gateway: ApiGateway

  constructor(options: TAccessPointsApiOptions) {
    this.gateway = options.gateway
  }

  public async list(options?: TListOptions): Promise<TPage<TAccessPoint>> {
    return await this.gateway.post<TPage<TAccessPoint>>(
      '/venues/aps/query',
      buildListQuery(options),
    )
  }

  /** Looks the AP up through the query endpoint; there is no direct by-ID read. */
  public async get(apId: string): Promise<TAccessPoint> {
    const page = await this.gateway.post<TPage<TAccessPoint> | undefined>('/venues/aps/query', {
      filters: [{ type: 'ID', value: apId }],
    })
    const [accessPoint] = page?.data ?? []
    if (!accessPoint) {
      throw new ResourceNotFoundError({ resource: { kind: 'AP', id: apId } })
    }
    return accessPoint
  }

  public async update(
    venueId: string,
    serialNumber: string,
    changes: TJsonObject,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(apPath(venueId, serialNumber), changes, {
      resource: apRef(venueId, serialNumber),
    })
  }

  public async reboot(venueId: string, serialNumber: string): Promise<TJsonObject | undefined> {
    return await this.gateway.post<TJsonObject | undefined>(
      `${apPath(venueId, serialNumber)}/reboot`,
      undefined,
      { resource: apRef(venueId, serialNumber) },
    )
  }

  public async queryClients(
    serialNumber?: string,
    query: Partial<TListQueryBody> = {},
  ): Promise<TPage<TJsonObject>> {
    const body: Partial<TListQueryBody> = serialNumber
      ? { ...query, filters: { serialNumber: [serialNumber] } }
      : query
    return await this.gateway.post<TPage<TJsonObject>>('/venues/aps/clients/query', body)
  }

  public async getRadioSettings(venueId: string, serialNumber: string): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(`${apPath(venueId, serialNumber)}/radioSettings`, {
      resource: apRef(venueId, serialNumber),
    })
  }

  public async updateRadioSettings(
    venueId: string,
    serialNumber: string,
    settings: TJsonObject,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(
      `${apPath(venueId, serialNumber)}/radioSettings`,
      settings,
      { resource: apRef(venueId, serialNumber) },
    )
  }

  public async getStatistics(venueId: string, serialNumber: string): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(`${apPath(venueId, serialNumber)}/statistics`, {
      resource: apRef(venueId, serialNumber),
    })
  }

  public async addToGroup(
    venueId: string,
    apGroupId: string,
    serialNumbers: string[],
  ): Promise<TJsonObject> {
    return await this.gateway.post<TJsonObject>(
      `/venues/${encodeURIComponent(venueId)}/apGroups/${encodeURIComponent(apGroupId)}/members`,
      { serialNumbers },
      {
        resource: { kind: 'AP group', id: apGroupId, parent: { kind: 'venue', id: venueId } },
      },
    )
  }
}
