import type { TJsonValue } from './types.ts'

/** Tag carried by every classified failure. */
export type TErrorKind =
  | 'configuration'
  | 'authentication'
  | 'not_found'
  | 'validation'
  | 'rate_limit'
  | 'server'
  | 'generic'

export type TErrorDetail = TJsonValue | undefined

/** Identifies the resource a request addressed, used to phrase not-found failures. */
export type TResourceRef = {
  kind: string
  id: string
  parent?: { kind: string; id: string }
}

export type TRuckusOneErrorOptions = {
  statusCode?: number
  detail?: TErrorDetail
  message?: string
  cause?: unknown
}

export function stringifyDetail(detail: TErrorDetail): string | undefined {
  if (detail === undefined || detail === null || detail === '') return undefined
  if (typeof detail === 'string') return detail
  return JSON.stringify(detail)
}

function resolveMessage(options: TRuckusOneErrorOptions, fallback: string): string {
  return options.message ?? stringifyDetail(options.detail) ?? fallback
}

/** Base class for every error raised by this package. */
export class RuckusOneError extends Error {
  readonly kind: TErrorKind
  readonly statusCode?: number
  readonly detail?: TErrorDetail

  constructor(kind: TErrorKind, message: string, options: TRuckusOneErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'RuckusOneError'
    this.kind = kind
    this.statusCode = options.statusCode
    this.detail = options.detail
  }
}

/** Indicates a configuration problem detected at construction time or while resolving CLI settings. */
export class ConfigurationError extends RuckusOneError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

/** Credentials were rejected, the token exchange was malformed, or the API answered 401. */
export class AuthenticationError extends RuckusOneError {
  constructor(options: TRuckusOneErrorOptions | string = {}) {
    const resolved = typeof options === 'string' ? { message: options } : options
    super(
      'authentication',
      resolveMessage(
        resolved,
        resolved.statusCode
          ? `Authentication failed (status ${resolved.statusCode})`
          : 'Authentication failed',
      ),
      resolved,
    )
    this.name = 'AuthenticationError'
  }
}

/** A non-successful HTTP response or a transport failure while talking to the API. */
export class APIError extends RuckusOneError {
  constructor(options: TRuckusOneErrorOptions | string = {}, kind: TErrorKind = 'generic') {
    const resolved = typeof options === 'string' ? { message: options } : options
    super(
      kind,
      resolveMessage(
        resolved,
        resolved.statusCode ? `API error (status ${resolved.statusCode})` : 'API error',
      ),
      resolved,
    )
    this.name = 'APIError'
  }
}

export type TResourceNotFoundOptions = Omit<TRuckusOneErrorOptions, 'statusCode'> & {
  resource?: TResourceRef
}

function describeResource(resource: TResourceRef): string {
  const base = `${resource.kind} with ID ${resource.id} not found`
  return resource.parent ? `${base} in ${resource.parent.kind} ${resource.parent.id}` : base
}

/** The API answered 404. Carries the addressed resource when the caller supplied one. */
export class ResourceNotFoundError extends APIError {
  readonly resource?: TResourceRef

  constructor(options: TResourceNotFoundOptions = {}) {
    super(
      {
        ...options,
        statusCode: 404,
        message:
          options.message ??
          (options.resource ? describeResource(options.resource) : undefined) ??
          stringifyDetail(options.detail) ??
          'Resource not found (status 404)',
      },
      'not_found',
    )
    this.name = 'ResourceNotFoundError'
    this.resource = options.resource
  }
}

/** The API answered 400, or a request was rejected locally before being sent. */
export class ValidationError extends APIError {
  constructor(options: Omit<TRuckusOneErrorOptions, 'statusCode'> | string = {}) {
    const resolved = typeof options === 'string' ? { message: options } : options
    super(
      {
        ...resolved,
        statusCode: 400,
        message: resolveMessage(resolved, 'Validation error (status 400)'),
      },
      'validation',
    )
    this.name = 'ValidationError'
  }
}

/** The API answered 429. */
export class RateLimitError extends APIError {
  constructor(options: Omit<TRuckusOneErrorOptions, 'statusCode'> = {}) {
    super(
      {
        ...options,
        statusCode: 429,
        message: resolveMessage(options, 'Rate limit exceeded (status 429)'),
      },
      'rate_limit',
    )
    this.name = 'RateLimitError'
  }
}

/** The API answered with a 5xx status. */
export class ServerError extends APIError {
  constructor(options: TRuckusOneErrorOptions = {}) {
    const statusCode = options.statusCode ?? 500
    super(
      {
        ...options,
        statusCode,
        message: resolveMessage(options, `Server error (status ${statusCode})`),
      },
      'server',
    )
    this.name = 'ServerError'
  }
}

export function isRuckusOneError(value: unknown): value is RuckusOneError {
  return value instanceof RuckusOneError
}
