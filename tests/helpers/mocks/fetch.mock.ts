import { vi } from 'vitest'

type FetchArgs = Parameters<typeof fetch>
type FetchInput = FetchArgs[0]

export type FetchMockItem =
  | Response
  | { body?: unknown; status?: number; headers?: Record<string, string> }
  | ((input: FetchInput, init?: RequestInit) => Response | Promise<Response>)

export type TRecordedCall = {
  url: string
  method: string
  /** Header names are lower-cased */
  headers: Record<string, string>
  body: RequestInit['body']
}

const toUrlString = (input: FetchInput): string => {
  if (typeof input === 'string') return input
  if (input instanceof URL) return input.href
  return input.url
}

const toHeaderRecord = (init?: ConstructorParameters<typeof Headers>[0]): Record<string, string> => {
  const record: Record<string, string> = {}
  new Headers(init).forEach((value, key) => {
    record[key] = value
  })
  return record
}

export const jsonResponse = (body?: unknown, init?: ResponseInit) =>
  new Response(body === undefined ? undefined : JSON.stringify(body), {
    status: 200,
    ...init,
    headers: { 'content-type': 'application/json', ...toHeaderRecord(init?.headers) },
  })

/** Parses the JSON body of a recorded call. */
export function jsonBody(call: TRecordedCall | undefined): unknown {
  return typeof call?.body === 'string' ? JSON.parse(call.body) : undefined
}

/**
 * A fetch stand-in that answers queued responses in order and records every call.
 * Throws when a request arrives with nothing queued.
 */
export function createFetchMock() {
  const calls: TRecordedCall[] = []
  const queue: FetchMockItem[] = []

  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = toUrlString(input)
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: toHeaderRecord(init?.headers),
      body: init?.body,
    })
    const next = queue.shift()
    if (!next) throw new Error(`No mock queued for fetch: ${url}`)
    if (typeof next === 'function') return await Promise.resolve(next(input, init))
    if (next instanceof Response) return next
    const { body, status = 200, headers } = next
    return jsonResponse(body, { status, headers })
  })

  return {
    fetch: fetchMock,
    calls,
    queue,
    push: (item: FetchMockItem) => queue.push(item),
    pushJson: (body: unknown, init?: { status?: number; headers?: Record<string, string> }) =>
      queue.push({ body, ...init }),
    pushText: (text: string, init?: { status?: number; contentType?: string }) =>
      queue.push(
        new Response(text, {
          status: init?.status ?? 200,
          headers: { 'content-type': init?.contentType ?? 'text/plain' },
        }),
      ),
    /** Headers arrive, then reading the body fails as on a dropped connection. */
    pushBrokenBody: (init?: { status?: number; contentType?: string }) =>
      queue.push(
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new TypeError('terminated'))
            },
          }),
          {
            status: init?.status ?? 200,
            headers: { 'content-type': init?.contentType ?? 'application/json' },
          },
        ),
      ),
    pushToken: (accessToken = 'test-token', expiresIn = 3600) =>
      queue.push({ body: { access_token: accessToken, expires_in: expiresIn } }),
  }
}

export type TFetchMock = ReturnType<typeof createFetchMock>
