import { describe, expect, it } from 'vitest'
import { SwitchesApi } from '../../../../src/domains/switches/switches.api.ts'
import {
  createFetchMock,
  createTestGateway,
  jsonBody,
  makePage,
  type TFetchMock,
} from '../../../helpers/index.ts'

describe('SwitchesApi', () => {
  const createApi = (fetchMock: TFetchMock) =>
    new SwitchesApi({ gateway: createTestGateway(fetchMock) })

  it('lists switches and ports through the query endpoints', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(makePage([]))
    fetchMock.pushJson(makePage([]))
    const api = createApi(fetchMock)

    await api.list({ sortField: 'name', sortOrder: 'desc' })
    await api.listPorts()

    expect(fetchMock.calls.map((call) => call.url)).toEqual([
      'https://api.ruckus.cloud/venues/switches/query',
      'https://api.ruckus.cloud/venues/switches/switchPorts/query',
    ])
    expect(jsonBody(fetchMock.calls[0])).toEqual({
      pageSize: 100,
      page: 0,
      sortOrder: 'DESC',
      sortField: 'name',
    })
  })

  it('addresses a switch under its venue', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ id: 'sw-1' })
    fetchMock.pushJson({ id: 'sw-1' })
    fetchMock.push(new Response(null, { status: 202 }))
    const api = createApi(fetchMock)

    await api.get('v-1', 'sw-1')
    await api.update('v-1', 'sw-1', { name: 'core' })
    await api.reboot('v-1', 'sw-1')

    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'GET https://api.ruckus.cloud/venues/v-1/switches/sw-1',
      'PUT https://api.ruckus.cloud/venues/v-1/switches/sw-1',
      'POST https://api.ruckus.cloud/venues/v-1/switches/sw-1/reboot',
    ])
  })

  it('names the switch and venue on 404', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({}, { status: 404 })

    await expect(createApi(fetchMock).get('v-1', 'sw-9')).rejects.toThrow(
      'Switch with ID sw-9 not found in venue v-1',
    )
  })

  it('configures a port', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({})

    await createApi(fetchMock).configurePort('v-1', 'sw-1', '1/1/1', { enabled: false })

    const [call] = fetchMock.calls
    expect(call?.url).toBe('https://api.ruckus.cloud/venues/v-1/switches/sw-1/ports/1%2F1%2F1')
    expect(jsonBody(call)).toEqual({ enabled: false })
  })

  it('manages switch VLANs', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson([{ vlanId: 1 }])
    fetchMock.pushJson({ vlanId: 20 })
    fetchMock.pushJson({ vlanId: 20 })
    fetchMock.push(new Response(null, { status: 204 }))
    const api = createApi(fetchMock)

    await api.listVlans('v-1', 'sw-1')
    await api.createVlan('v-1', 'sw-1', 20, { vlanName: 'guests' })
    await api.configureVlan('v-1', 'sw-1', 20, { vlanName: 'visitors' })
    await api.deleteVlan('v-1', 'sw-1', 20)

    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'GET https://api.ruckus.cloud/venues/v-1/switches/sw-1/vlans',
      'POST https://api.ruckus.cloud/venues/v-1/switches/sw-1/vlans',
      'PUT https://api.ruckus.cloud/venues/v-1/switches/sw-1/vlans/20',
      'DELETE https://api.ruckus.cloud/venues/v-1/switches/sw-1/vlans/20',
    ])
    expect(jsonBody(fetchMock.calls[1])).toEqual({ id: 20, vlanName: 'guests' })
  })

  it('names the VLAN and switch on 404', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({}, { status: 404 })

    await expect(createApi(fetchMock).deleteVlan('v-1', 'sw-1', 30)).rejects.toThrow(
      'VLAN with ID 30 not found in switch sw-1',
    )
  })

  it('gets statistics', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ portsUp: 12 })

    expect(await createApi(fetchMock).getStatistics('v-1', 'sw-1')).toEqual({ portsUp: 12 })
  })
})
