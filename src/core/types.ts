import type { TResourceRef } from './errors.ts'

export type TRegion = 'na' | 'eu' | 'asia'

export type TJsonValue =
  | string
  | number
  | boolean
  | null
  | TJsonValue[]
  | { [key: string]: TJsonValue }

export type TEndpointProvider = {
  /** Returns the API base URL such as https://api.ruckus.cloud */
  getApiBase(): string
}

export type TTokenProvider = {
  /** Returns the headers every API call carries, including a currently valid bearer token. */
  getAuthHeaders(): Promise<Record<string, string>>
}

export type TCredentials = {
  /** OAuth2 client ID issued by RUCKUS One */
  clientId: string
  /** OAuth2 client secret issued by RUCKUS One */
  clientSecret: string
  /** RUCKUS One tenant ID */
  tenantId: string
  /** API region; unknown codes fall back to "na" */
  region?: TRegion | (string & {})
}

export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type TQueryParams = Record<string, string | number | boolean | undefined>

export type TRequestOptions = {
  /** Query string parameters; undefined values are skipped */
  params?: TQueryParams
  /** Form body: key/value pairs are url-encoded, a string is sent as-is, FormData as multipart */
  formData?: Record<string, string> | string | FormData
  /** JSON body; mutually exclusive with formData */
  json?: unknown
  /** Extra headers, taking precedence over the auth headers */
  headers?: Record<string, string>
  /** Resource addressed by the call, used to phrase not-found failures */
  resource?: TResourceRef
}

export type TRawRequestOptions = TRequestOptions & { rawResponse: true }

/** Decoded success payload: parsed JSON, raw bytes for other content types, undefined for empty bodies. */
export type TDecodedBody = TJsonValue | Uint8Array | undefined
