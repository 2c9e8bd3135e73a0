import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import { buildListQuery, type TListOptions } from '../../core/query.ts'
import type { TJsonObject, TPage, TSwitch, TSwitchVlan } from '../../types/api.ts'

export type TSwitchesApiOptions = {
  gateway: ApiGateway
}

export interface TSwitchesApi {
  list(options?: TListOptions): Promise<TPage<TSwitch>>
  get(venueId: string, switchId: string): Promise<TSwitch>
  update(venueId: string, switchId: string, changes: TJsonObject): Promise<TSwitch>
  reboot(venueId: string, switchId: string): Promise<TJsonObject | undefined>
  listPorts(options?: TListOptions): Promise<TPage<TJsonObject>>
  configurePort(
    venueId: string,
    switchId: string,
    portId: string,
    settings: TJsonObject,
  ): Promise<TJsonObject>
  listVlans(venueId: string, switchId: string): Promise<TSwitchVlan[]>
  createVlan(
    venueId: string,
    switchId: string,
    vlanId: number,
    settings?: TJsonObject,
  ): Promise<TSwitchVlan>
  configureVlan(
    venueId: string,
    switchId: string,
    vlanId: number,
    settings: TJsonObject,
  ): Promise<TSwitchVlan>
  deleteVlan(venueId: string, switchId: string, vlanId: number): Promise<void>
  getStatistics(venueId: string, switchId: string): Promise<TJsonObject>
}

function switchPath(venueId: string, switchId: string): string {
  return `/venues/${encodeURIComponent(venueId)}/switches/${encodeURIComponent(switchId)}`
}

function switchRef(venueId: string, switchId: string): TResourceRef {
  return { kind: 'Switch', id: switchId, parent: { kind: 'venue', id: venueId } }
}

function vlanRef(switchId: string, vlanId: number): TResourceRef {
  return { kind: 'VLAN', id: String(vlanId), parent: { kind: 'switch', id: switchId } }
}

export class SwitchesApi implements TSwitchesApi {
  private gateway: ApiGateway

  constructor(options: TSwitchesApiOptions) {
    this.gateway = options.gateway
  }

  public async list(options?: TListOptions): Promise<TPage<TSwitch>> {
    return await this.gateway.post<TPage<TSwitch>>(
      '/venues/switches/query',
      buildListQuery(options),
    )
  }

  public async get(venueId: string, switchId: string): Promise<TSwitch> {
    return await this.gateway.get<TSwitch>(switchPath(venueId, switchId), {
      resource: switchRef(venueId, switchId),
    })
  }

  public async update(
    venueId: string,
    switchId: string,
    changes: TJsonObject,
  ): Promise<TSwitch> {
    return await this.gateway.put<TSwitch>(switchPath(venueId, switchId), changes, {
      resource: switchRef(venueId, switchId),
    })
  }

  public async reboot(venueId: string, switchId: string): Promise<TJsonObject | undefined> {
    return await this.gateway.post<TJsonObject | undefined>(
      `${switchPath(venueId, switchId)}/reboot`,
      undefined,
      { resource: switchRef(venueId, switchId) },
    )
  }

  public async listPorts(options?: TListOptions): Promise<TPage<TJsonObject>> {
    return await this.gateway.post<TPage<TJsonObject>>(
      '/venues/switches/switchPorts/query',
      buildListQuery(options),
    )
  }

  public async configurePort(
    venueId: string,
    switchId: string,
    portId: string,
    settings: TJsonObject,
  ): Promise<TJsonObject> {
    return await this.gateway.put<TJsonObject>(
      `${switchPath(venueId, switchId)}/ports/${encodeURIComponent(portId)}`,
      settings,
      { resource: { kind: 'Switch port', id: portId, parent: { kind: 'switch', id: switchId } } },
    )
  }

  public async listVlans(venueId: string, switchId: string): Promise<TSwitchVlan[]> {
    return await this.gateway.get<TSwitchVlan[]>(`${switchPath(venueId, switchId)}/vlans`, {
      resource: switchRef(venueId, switchId),
    })
  }

  public async createVlan(
    venueId: string,
    switchId: string,
    vlanId: number,
    settings: TJsonObject = {},
  ): Promise<TSwitchVlan> {
    return await this.gateway.post<TSwitchVlan>(
      `${switchPath(venueId, switchId)}/vlans`,
      { id: vlanId, ...settings },
      { resource: switchRef(venueId, switchId) },
    )
  }

  public async configureVlan(
    venueId: string,
    switchId: string,
    vlanId: number,
    settings: TJsonObject,
  ): Promise<TSwitchVlan> {
    return await this.gateway.put<TSwitchVlan>(
      `${switchPath(venueId, switchId)}/vlans/${vlanId}`,
      settings,
      { resource: vlanRef(switchId, vlanId) },
    )
  }

  public async deleteVlan(venueId: string, switchId: string, vlanId: number): Promise<void> {
    await this.gateway.delete(`${switchPath(venueId, switchId)}/vlans/${vlanId}`, {
      resource: vlanRef(switchId, vlanId),
    })
  }

  public async getStatistics(venueId: string, switchId: string): Promise<TJsonObject> {
    return await this.gateway.get<TJsonObject>(`${switchPath(venueId, switchId)}/statistics`, {
      resource: switchRef(venueId, switchId),
    })
  }
}
