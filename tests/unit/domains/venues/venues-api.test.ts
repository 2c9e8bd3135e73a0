import { describe, expect, it } from 'vitest'
import { ResourceNotFoundError } from '../../../../src/core/errors.ts'
import { VenuesApi } from '../../../../src/domains/venues/venues.api.ts'
import {
  createFetchMock,
  createTestGateway,
  jsonBody,
  makePage,
  makeVenue,
  type TFetchMock,
} from '../../../helpers/index.ts'

describe('VenuesApi', () => {
  const createApi = (fetchMock: TFetchMock) =>
    new VenuesApi({ gateway: createTestGateway(fetchMock) })

  it('lists venues through the query endpoint', async () => {
    const fetchMock = createFetchMock()
    const page = makePage([makeVenue(), makeVenue()])
    fetchMock.pushJson(page)

    const result = await createApi(fetchMock).list({ pageSize: 25, searchString: 'lab' })

    expect(result).toEqual(page)
    const [call] = fetchMock.calls
    expect(call?.method).toBe('POST')
    expect(call?.url).toBe('https://api.ruckus.cloud/venues/query')
    expect(jsonBody(call)).toEqual({
      pageSize: 25,
      page: 0,
      sortOrder: 'ASC',
      searchString: 'lab',
    })
  })

  it('gets a venue by ID', async () => {
    const fetchMock = createFetchMock()
    const venue = makeVenue({ id: 'v-1' })
    fetchMock.pushJson(venue)

    expect(await createApi(fetchMock).get('v-1')).toEqual(venue)
    expect(fetchMock.calls[0]?.url).toBe('https://api.ruckus.cloud/venues/v-1')
  })

  it('names the venue when it does not exist', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ message: 'Not Found' }, { status: 404 })

    const error = await createApi(fetchMock)
      .get('missing')
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ResourceNotFoundError)
    expect(error).toMatchObject({ message: 'Venue with ID missing not found' })
  })

  it('creates a venue and omits empty optional fields', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ id: 'v-2' })

    await createApi(fetchMock).create({
      name: 'HQ',
      address: { city: 'Sunnyvale', country: 'United States' },
      description: '',
      timezone: 'America/Los_Angeles',
    })

    const [call] = fetchMock.calls
    expect(call?.url).toBe('https://api.ruckus.cloud/venues')
    expect(jsonBody(call)).toEqual({
      name: 'HQ',
      address: { city: 'Sunnyvale', country: 'United States' },
      timezone: 'America/Los_Angeles',
    })
  })

  it('updates a venue with PUT', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ id: 'v-1', name: 'Renamed' })

    await createApi(fetchMock).update('v-1', { name: 'Renamed' })

    const [call] = fetchMock.calls
    expect(call?.method).toBe('PUT')
    expect(jsonBody(call)).toEqual({ name: 'Renamed' })
  })

  it('deletes a venue', async () => {
    const fetchMock = createFetchMock()
    fetchMock.push(new Response(null, { status: 204 }))

    await expect(createApi(fetchMock).delete('v-1')).resolves.toBeUndefined()
    expect(fetchMock.calls[0]?.method).toBe('DELETE')
  })

  it('lists the access points of a venue', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson([])

    await createApi(fetchMock).listAccessPoints('v 1')

    expect(fetchMock.calls[0]?.url).toBe('https://api.ruckus.cloud/venues/v%201/aps')
  })

  const venueQueries: Array<['querySwitches' | 'queryWlans' | 'queryClients', string]> = [
    ['querySwitches', 'switches'],
    ['queryWlans', 'wifiNetworks'],
    ['queryClients', 'clients'],
  ]

  it.each(venueQueries)('%s posts to the venue %s query', async (method, segment) => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(makePage([]))

    await createApi(fetchMock)[method]('v-1', { pageSize: 5 })

    const [call] = fetchMock.calls
    expect(call?.url).toBe(`https://api.ruckus.cloud/venues/v-1/${segment}/query`)
    expect(jsonBody(call)).toEqual({ pageSize: 5 })
  })
})
