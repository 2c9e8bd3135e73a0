import type { ApiGateway } from '../../core/api-gateway.ts'
import type { TResourceRef } from '../../core/errors.ts'
import type { TDecodedBody } from '../../core/types.ts'
import type {
  TDpskDevice,
  TDpskPassphrase,
  TDpskService,
  TJsonObject,
  TListQueryBody,
} from '../../types/api.ts'

export type TDpskApiOptions = {
  gateway: ApiGateway
}

export type TCreateDpskServiceInput = {
  name: string
  [key: string]: unknown
}

export type TDeviceInput = {
  mac: string
  [key: string]: unknown
}

/** DPSK services, their passphrases and the devices bound to each passphrase. */
export interface TDpskApi {
  listServices(query?: Partial<TListQueryBody>): Promise<TDpskService[]>
  getService(serviceId: string): Promise<TDpskService>
  createService(input: TCreateDpskServiceInput): Promise<TDpskService>
  updateService(serviceId: string, changes: TJsonObject): Promise<TDpskService>
  deleteService(serviceId: string): Promise<void>
  listPassphrases(serviceId: string, query?: Partial<TListQueryBody>): Promise<TDpskPassphrase[]>
  getPassphrase(serviceId: string, passphraseId: string): Promise<TDpskPassphrase>
  createPassphrases(serviceId: string, passphrases: TJsonObject[]): Promise<TJsonObject>
  updatePassphrase(
    serviceId: string,
    passphraseId: string,
    changes: TJsonObject,
  ): Promise<TDpskPassphrase>
  deletePassphrases(serviceId: string, passphraseIds: string[]): Promise<void>
  batchUpdatePassphrases(serviceId: string, updates: TJsonObject[]): Promise<TJsonObject>
  listDevices(serviceId: string, passphraseId: string): Promise<TDpskDevice[]>
  addDevices(
    serviceId: string,
    passphraseId: string,
    devices: TDeviceInput[],
  ): Promise<TJsonObject>
  updateDevices(
    serviceId: string,
    passphraseId: string,
    devices: TDeviceInput[],
  ): Promise<TJsonObject>
  removeDevices(serviceId: string, passphraseId: string, deviceMacs: string[]): Promise<void>
  importPassphrasesCsv(serviceId: string, csv: string): Promise<TDecodedBody>
  exportPassphrasesCsv(serviceId: string, query?: Partial<TListQueryBody>): Promise<string>
  associateWithWlan(wlanId: string, serviceId: string): Promise<TJsonObject | undefined>
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Accepts either a bare array or a `{ <key>: [...] }` envelope. */
function unwrapList<T>(body: unknown, ...keys: string[]): T[] {
  if (Array.isArray(body)) return body
  if (isObject(body)) {
    for (const key of keys) {
      const value = body[key]
      if (Array.isArray(value)) return value
    }
  }
  return []
}

function servicePath(serviceId: string): string {
  return `/dpskServices/${encodeURIComponent(serviceId)}`
}

function serviceRef(serviceId: string): TResourceRef {
  return { kind: 'DPSK service', id: serviceId }
}

function passphraseRef(serviceId: string, passphraseId: string): TResourceRef {
  return { kind: 'Passphrase', id: passphraseId, parent: { kind: 'DPSK service', id: serviceId } }
}

export class DpskApi implements TDpskApi {
  private gateway: ApiGateway

  constructor(options: TDpskApiOptions) {
    this.gateway = options.gateway
  }

  public async listServices(query?: Partial<TListQueryBody>): Promise<TDpskService[]> {
    const body = await this.gateway.post('/dpskServices/query', query ?? {})
    return unwrapList<TDpskService>(body, 'data')
  }

  public async getService(serviceId: string): Promise<TDpskService> {
    return await this.gateway.get<TDpskService>(servicePath(serviceId), {
      resource: serviceRef(serviceId),
    })
  }

  public async createService(input: TCreateDpskServiceInput): Promise<TDpskService> {
    return await this.gateway.post<TDpskService>('/dpskServices', input)
  }

  public async updateService(
    serviceId: string,
    changes: TJsonObject,
  ): Promise<TDpskService> {
    return await this.gateway.put<TDpskService>(servicePath(serviceId), changes, {
      resource: serviceRef(serviceId),
    })
  }

  public async deleteService(serviceId: string): Promise<void> {
    await this.gateway.delete(servicePath(serviceId), { resource: serviceRef(serviceId) })
  }

  public async listPassphrases(
    serviceId: string,
    query?: Partial<TListQueryBody>,
  ): Promise<TDpskPassphrase[]> {
    const body = await this.gateway.post(
      `${servicePath(serviceId)}/passphrases/query`,
      query ?? {},
      { resource: serviceRef(serviceId) },
    )
    return unwrapList<TDpskPassphrase>(body, 'data')
  }

  public async getPassphrase(serviceId: string, passphraseId: string): Promise<TDpskPassphrase> {
    return await this.gateway.get<TDpskPassphrase>(
      `${servicePath(serviceId)}/passphrases/${encodeURIComponent(passphraseId)}`,
      { resource: passphraseRef(serviceId, passphraseId) },
    )
  }

  public async createPassphrases(
    serviceId: string,
    passphrases: TJsonObject[],
  ): Promise<TJsonObject> {
    return await this.gateway.post<TJsonObject>(
      `${servicePath(serviceId)}/passphrases`,
      { passphrases },
      { resource: serviceRef(serviceId) },
    )
  }

  public async updatePassphrase(
    serviceId: string,
    passphraseId: string,
    changes: TJsonObject,
  ): Promise<TDpskPassphrase> {
    return await this.gateway.put<TDpskPassphrase>(
      `${servicePath(serviceId)}/passphrases/${encodeURIComponent(passphraseId)}`,
      changes,
      { resource: passphraseRef(serviceId, passphraseId) },
    )
  }

  public async deletePassphrases(serviceId: string, passphraseIds: string[]): Promise<void> {
    await this.gateway.delete(`${servicePath(serviceId)}/passphrases`, {
      json: { passphraseIds },
      resource: serviceRef(serviceId),
    })
  }

  public async batchUpdatePassphrases(
    serviceId: string,
    updates: TJsonObject[],
  ): Promise<TJsonObject> {
    return await this.gateway.patch<TJsonObject>(
      `${servicePath(serviceId)}/passphrases`,
      { passphrases: updates },
      { resource: serviceRef(serviceId) },
    )
  }

  public async listDevices(serviceId: string, passphraseId: string): Promise<TDpskDevice[]> {
    const body = await this.gateway.get(this.devicesPath(serviceId, passphraseId), {
      resource: passphraseRef(serviceId, passphraseId),
    })
    return unwrapList<TDpskDevice>(body, 'devices', 'data')
  }

  public async addDevices(
    serviceId: string,
    passphraseId: string,
    devices: TDeviceInput[],
  ): Promise<TJsonObject> {
    return await this.gateway.post<TJsonObject>(
      this.devicesPath(serviceId, passphraseId),
      { devices },
      { resource: passphraseRef(serviceId, passphraseId) },
    )
  }

  public async updateDevices(
    serviceId: string,
    passphraseId: string,
    devices: TDeviceInput[],
  ): Promise<TJsonObject> {
    return await this.gateway.patch<TJsonObject>(
      this.devicesPath(serviceId, passphraseId),
      { devices },
      { resource: passphraseRef(serviceId, passphraseId) },
    )
  }

  public async removeDevices(
    serviceId: string,
    passphraseId: string,
    deviceMacs: string[],
  ): Promise<void> {
    await this.gateway.delete(this.devicesPath(serviceId, passphraseId), {
      json: { deviceMacs },
      resource: passphraseRef(serviceId, passphraseId),
    })
  }

  public async importPassphrasesCsv(serviceId: string, csv: string): Promise<TDecodedBody> {
    return await this.gateway.post(`${servicePath(serviceId)}/passphrases/csvFiles`, undefined, {
      formData: csv,
      headers: { 'Content-Type': 'text/csv' },
      resource: serviceRef(serviceId),
    })
  }

  public async exportPassphrasesCsv(
    serviceId: string,
    query?: Partial<TListQueryBody>,
  ): Promise<string> {
    const response = await this.gateway.request(
      'POST',
      `${servicePath(serviceId)}/passphrases/query/csvFiles`,
      { json: query ?? {}, rawResponse: true, resource: serviceRef(serviceId) },
    )
    return await this.gateway.readText(response)
  }

  public async associateWithWlan(
    wlanId: string,
    serviceId: string,
  ): Promise<TJsonObject | undefined> {
    return await this.gateway.put<TJsonObject | undefined>(
      `/wifiNetworks/${encodeURIComponent(wlanId)}/dpskServices/${encodeURIComponent(serviceId)}`,
      {},
      { resource: { kind: 'WLAN', id: wlanId } },
    )
  }

  private devicesPath(serviceId: string, passphraseId: string): string {
    return `${servicePath(serviceId)}/passphrases/${encodeURIComponent(passphraseId)}/devices`
  }
}
