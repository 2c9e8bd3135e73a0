import { RegionEndpoint } from '../providers/endpoint/region-endpoint.ts'
import {
  APIError,
  AuthenticationError,
  ConfigurationError,
  RateLimitError,
  ResourceNotFoundError,
  ServerError,
  ValidationError,
  type RuckusOneError,
  type TErrorDetail,
  type TResourceRef,
} from './errors.ts'
import { logger } from './logger.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TDecodedBody,
  TEndpointProvider,
  THttpMethod,
  TRawRequestOptions,
  TRequestOptions,
  TTokenProvider,
} from './types.ts'
import {
  describeTransportFailure,
  extractErrorDetail,
  fetchWithTimeout,
  isJsonContentType,
  joinUrl,
  resolveFetch,
  validatePositiveNumber,
} from './utils.ts'

const DEFAULT_TIMEOUT_MS = 30_000

export type TApiGatewayOptions = {
  tokenProvider: TTokenProvider
  /** Region code used when no endpointProvider is given; unknown codes fall back to "na" */
  region?: string
  endpointProvider?: TEndpointProvider
  fetchImplementation?: typeof fetch
  /** Transport timeout per request @default 30000 */
  timeoutMs?: number
}

/** Maps a non-2xx status and its decoded detail to the error kind the status denotes. */
export function classifyError(
  statusCode: number,
  detail: TErrorDetail,
  resource?: TResourceRef,
): RuckusOneError {
  if (statusCode === 401) return new AuthenticationError({ statusCode, detail })
  if (statusCode === 404) return new ResourceNotFoundError({ detail, resource })
  if (statusCode === 400) return new ValidationError({ detail })
  if (statusCode === 429) return new RateLimitError({ detail })
  if (statusCode >= 500 && statusCode <= 599) return new ServerError({ statusCode, detail })
  return new APIError({ statusCode, detail })
}

function setHeader(headers: Record<string, string>, name: string, value: string | undefined): void {
  const lowerName = name.toLowerCase()
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lowerName) delete headers[existing]
  }
  if (value !== undefined) headers[name] = value
}

/**
 * Turns a logical API call into an HTTP exchange against the regional endpoint and
 * classifies the outcome. Every failure leaves as a RuckusOneError; nothing is retried.
 */
export class ApiGateway {
  private readonly baseUrl: string
  private readonly tokenProvider: TTokenProvider
  private readonly fetchImplementation: typeof fetch
  private readonly timeoutMs: number

  constructor(options: TApiGatewayOptions) {
    validatePositiveNumber(options.timeoutMs, 'timeoutMs')
    const endpointProvider =
      options.endpointProvider ?? new RegionEndpoint({ region: options.region })
    this.baseUrl = endpointProvider.getApiBase()
    this.tokenProvider = options.tokenProvider
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  getBaseUrl(): string {
    return this.baseUrl
  }

  request(method: THttpMethod, path: string, options: TRawRequestOptions): Promise<Response>
  request<TResponse = TDecodedBody>(
    method: THttpMethod,
    path: string,
    options?: TRequestOptions & { rawResponse?: false },
  ): Promise<TResponse>
  async request(
    method: THttpMethod,
    path: string,
    options: TRequestOptions & { rawResponse?: boolean } = {},
  ): Promise<unknown> {
    if (options.json !== undefined && options.formData !== undefined) {
      throw new ConfigurationError('json and formData are mutually exclusive')
    }

    const url = joinUrl(this.baseUrl, path, options.params)
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT }
    for (const [name, value] of Object.entries(await this.tokenProvider.getAuthHeaders())) {
      setHeader(headers, name, value)
    }

    let body: string | FormData | undefined
    if (options.json !== undefined) {
      body = JSON.stringify(options.json)
      setHeader(headers, 'Content-Type', 'application/json')
    } else if (options.formData instanceof FormData) {
      body = options.formData
      // fetch writes the multipart boundary itself
      setHeader(headers, 'Content-Type', undefined)
    } else if (typeof options.formData === 'string') {
      body = options.formData
    } else if (options.formData) {
      body = new URLSearchParams(options.formData).toString()
      setHeader(headers, 'Content-Type', 'application/x-www-form-urlencoded')
    }

    for (const [name, value] of Object.entries(options.headers ?? {})) {
      setHeader(headers, name, value)
    }

    logger.debug(`${method} ${url.toString()}`)

    let response: Response
    try {
      response = await fetchWithTimeout(
        this.fetchImplementation,
        url,
        { method, headers, body },
        this.timeoutMs,
      )
    } catch (error) {
      throw new APIError({
        message: `Request failed: ${describeTransportFailure(error, this.timeoutMs)}`,
        cause: error,
      })
    }

    logger.debug(`${method} ${url.pathname} -> ${response.status}`)
    const contentType = response.headers.get('content-type')

    if (response.status >= 200 && response.status < 300) {
      if (options.rawResponse) return response
      return await this.decodeSuccess(method, path, response, contentType)
    }

    const text = await this.readText(response)
    const detail = extractErrorDetail(text, contentType)
    logger.debug(`${method} ${url.pathname} failed with status ${response.status}`, detail)
    throw classifyError(response.status, detail, options.resource)
  }

  get<TResponse = TDecodedBody>(path: string, options?: TRequestOptions): Promise<TResponse> {
    return this.request<TResponse>('GET', path, options)
  }

  post<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.request<TResponse>('POST', path, { ...options, json: json ?? options?.json })
  }

  put<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.request<TResponse>('PUT', path, { ...options, json: json ?? options?.json })
  }

  patch<TResponse = TDecodedBody>(
    path: string,
    json?: unknown,
    options?: TRequestOptions,
  ): Promise<TResponse> {
    return this.request<TResponse>('PATCH', path, { ...options, json: json ?? options?.json })
  }

  delete<TResponse = TDecodedBody>(path: string, options?: TRequestOptions): Promise<TResponse> {
    return this.request<TResponse>('DELETE', path, options)
  }

  private async decodeSuccess(
    method: THttpMethod,
    path: string,
    response: Response,
    contentType: string | null,
  ): Promise<TDecodedBody> {
    const bytes = await this.readBytes(response)
    if (bytes.byteLength === 0) return undefined
    if (!isJsonContentType(contentType)) return bytes

    const text = new TextDecoder().decode(bytes)
    try {
      return JSON.parse(text)
    } catch (error) {
      throw new APIError({
        statusCode: response.status,
        detail: text,
        message: `Invalid JSON in response to ${method} ${path}`,
        cause: error,
      })
    }
  }

  /** Reads a raw response body as bytes; a failing body stream surfaces as APIError. */
  async readBytes(response: Response): Promise<Uint8Array> {
    try {
      return new Uint8Array(await response.arrayBuffer())
    } catch (error) {
      throw new APIError({
        statusCode: response.status,
        message: `Request failed: ${describeTransportFailure(error, this.timeoutMs)}`,
        cause: error,
      })
    }
  }

  /** Reads a raw response body as text; a failing body stream surfaces as APIError. */
  async readText(response: Response): Promise<string> {
    try {
      return await response.text()
    } catch (error) {
      throw new APIError({
        statusCode: response.status,
        message: `Request failed: ${describeTransportFailure(error, this.timeoutMs)}`,
        cause: error,
      })
    }
  }
}
