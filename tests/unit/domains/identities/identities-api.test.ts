import { describe, expect, it } from 'vitest'
import { APIError, ValidationError } from '../../../../src/core/errors.ts'
import { IdentitiesApi } from '../../../../src/domains/identities/identities.api.ts'
import { normalizeMac } from '../../../../src/domains/identities/validation.ts'
import {
  createFetchMock,
  createTestGateway,
  jsonBody,
  makeIdentity,
  type TFetchMock,
} from '../../../helpers/index.ts'

const identityUrl = 'https://api.ruckus.cloud/identityGroups/g-1/identities/i-1'

describe('normalizeMac', () => {
  it('upper-cases a dash-separated MAC address', () => {
    expect(normalizeMac('aa-bb-cc-00-11-22')).toBe('AA-BB-CC-00-11-22')
  })

  it.each(['aa:bb:cc:00:11:22', 'AABBCC001122', 'AA-BB-CC-00-11', 'GG-BB-CC-00-11-22'])(
    'rejects %s',
    (mac) => {
      expect(() => normalizeMac(mac)).toThrow(ValidationError)
      expect(() => normalizeMac(mac)).toThrow('MAC address must be in format XX-XX-XX-XX-XX-XX')
    },
  )
})

describe('IdentitiesApi', () => {
  const createApi = (fetchMock: TFetchMock) =>
    new IdentitiesApi({ gateway: createTestGateway(fetchMock) })

  it('lists identities with paging parameters', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ content: [] })

    await createApi(fetchMock).list({ page: 1, params: { sort: 'name' } })

    expect(fetchMock.calls[0]?.url).toBe(
      'https://api.ruckus.cloud/identities?page=1&size=20&sort=name',
    )
  })

  it('queries identities across groups', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ content: [] })

    await createApi(fetchMock).query({ pageSize: 50, dpskPoolId: 'pool-1', ethernetPort: '' })

    const [call] = fetchMock.calls
    expect(call?.url).toBe('https://api.ruckus.cloud/identities/query')
    expect(jsonBody(call)).toEqual({ page: 0, size: 50, dpskPoolId: 'pool-1' })
  })

  it('gets, updates with PATCH and deletes an identity', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(makeIdentity({ id: 'i-1' }))
    fetchMock.pushJson(makeIdentity({ id: 'i-1' }))
    fetchMock.push(new Response(null, { status: 204 }))
    const api = createApi(fetchMock)

    await api.get('g-1', 'i-1')
    await api.update('g-1', 'i-1', { vlan: 200 })
    await api.delete('g-1', 'i-1')

    expect(fetchMock.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      `GET ${identityUrl}`,
      `PATCH ${identityUrl}`,
      `DELETE ${identityUrl}`,
    ])
  })

  it('names the identity and group on 404', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({}, { status: 404 })

    await expect(createApi(fetchMock).get('g-1', 'i-9')).rejects.toThrow(
      'Identity with ID i-9 not found in group g-1',
    )
  })

  it('reads devices from the identity details', async () => {
    const fetchMock = createFetchMock()
    const devices = [{ macAddress: 'AA-BB-CC-00-11-22', name: 'laptop' }]
    fetchMock.pushJson(makeIdentity({ id: 'i-1', devices }))
    fetchMock.pushJson({ id: 'i-2', name: 'No devices' })
    const api = createApi(fetchMock)

    expect(await api.listDevices('g-1', 'i-1')).toEqual(devices)
    expect(await api.listDevices('g-1', 'i-2')).toEqual([])
  })

  it('adds a device with a normalized MAC address', async () => {
    const fetchMock = createFetchMock()
    fetchMock.push(new Response(null, { status: 201 }))

    await createApi(fetchMock).addDevice('g-1', 'i-1', 'aa-bb-cc-00-11-22', {
      name: 'phone',
      description: '',
    })

    const [call] = fetchMock.calls
    expect(`${call?.method} ${call?.url}`).toBe(`POST ${identityUrl}/devices`)
    expect(jsonBody(call)).toEqual([{ macAddress: 'AA-BB-CC-00-11-22', name: 'phone' }])
  })

  it('rejects a malformed MAC address before sending', async () => {
    const fetchMock = createFetchMock()

    await expect(
      createApi(fetchMock).addDevice('g-1', 'i-1', 'aa:bb:cc:00:11:22'),
    ).rejects.toThrow(ValidationError)
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('removes a device', async () => {
    const fetchMock = createFetchMock()
    fetchMock.push(new Response(null, { status: 204 }))

    await createApi(fetchMock).removeDevice('g-1', 'i-1', 'AA-BB-CC-00-11-22')

    expect(fetchMock.calls[0]?.url).toBe(`${identityUrl}/devices/AA-BB-CC-00-11-22`)
  })

  it('exports identities as CSV bytes', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushText('name,vlan\nUnit 101,100', { contentType: 'text/csv' })

    const bytes = await createApi(fetchMock).exportCsv({ dpskPoolId: 'pool-1' })

    expect(new TextDecoder().decode(bytes)).toBe('name,vlan\nUnit 101,100')
    const [call] = fetchMock.calls
    expect(call?.url).toBe('https://api.ruckus.cloud/identities/csvFile')
    expect(jsonBody(call)).toEqual({ dpskPoolId: 'pool-1' })
  })

  it('reports a failed CSV download as APIError', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushBrokenBody({ contentType: 'text/csv' })

    const error = await createApi(fetchMock)
      .exportCsv()
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(APIError)
    expect(error).toMatchObject({ statusCode: 200, message: 'Request failed: terminated' })
  })

  it('imports a CSV file as multipart form data', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ imported: 1 })

    const result = await createApi(fetchMock).importCsv('g-1', 'name\nUnit 101')

    expect(result).toEqual({ imported: 1 })
    const [call] = fetchMock.calls
    expect(call?.url).toBe('https://api.ruckus.cloud/identityGroups/g-1/identities/csvFile')
    expect(call?.headers['content-type']).toBeUndefined()
    expect(call?.body).toBeInstanceOf(FormData)
    const body = call?.body
    const file = body instanceof FormData ? body.get('file') : null
    expect(file).toBeInstanceOf(Blob)
    expect(file instanceof Blob ? await file.text() : undefined).toBe('name\nUnit 101')
  })
})
