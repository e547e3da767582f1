/**
 * Client Errors
 *
 * Every rejection coming out of the transceiver is a SentryError.
 * HTTP failures are mapped to a subclass by status code so callers can
 * branch with instanceof instead of inspecting numbers.
 */

import { isAxiosError } from 'axios'
import type { AxiosError } from 'axios'
import { ZodError } from 'zod'

export class SentryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export interface RequestInfo {
  method?: string
  url?: string
}

export class SentryApiError extends SentryError {
  readonly status: number
  readonly detail: string
  readonly method?: string
  readonly url?: string
  readonly data: unknown

  constructor(status: number, detail: string, request: RequestInfo = {}, data?: unknown, cause?: unknown) {
    const target = request.method && request.url ? ` (${request.method} ${request.url})` : ''
    super(`API Error ${status}: ${detail}${target}`, { cause })
    this.status = status
    this.detail = detail
    this.method = request.method
    this.url = request.url
    this.data = data
  }
}

export class BadRequestError extends SentryApiError {}
export class AuthenticationError extends SentryApiError {}
export class PermissionDeniedError extends SentryApiError {}
export class NotFoundError extends SentryApiError {}
export class ConflictError extends SentryApiError {}
export class RateLimitError extends SentryApiError {}
export class ServerError extends SentryApiError {}

export class NetworkError extends SentryError {
  readonly code?: string

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, { cause })
    this.code = code
  }
}

export class ResponseParseError extends SentryError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, { cause })
    this.issues = issues
  }
}

export class ConfigError extends SentryError {}

/** A call that would send a request the caller almost certainly did not mean */
export class InvalidArgumentError extends SentryError {}

export class MissingAttributeError extends SentryError {
  readonly key: string

  constructor(model: string, key: string) {
    super(`${model} has no attribute '${key}'`)
    this.key = key
  }
}

type ApiErrorClass = new (
  status: number,
  detail: string,
  request?: RequestInfo,
  data?: unknown,
  cause?: unknown
) => SentryApiError

const STATUS_ERRORS: Record<number, ApiErrorClass> = {
  400: BadRequestError,
  401: AuthenticationError,
  403: PermissionDeniedError,
  404: NotFoundError,
  409: ConflictError,
  429: RateLimitError,
}

function errorClassFor(status: number): ApiErrorClass {
  if (status >= 500) return ServerError
  return STATUS_ERRORS[status] ?? SentryApiError
}

/**
 * Pull a human readable message out of an error body.
 * The API answers with `{"detail": "..."}` for most failures.
 */
export function extractDetail(data: unknown, fallback: string): string {
  if (typeof data === 'string' && data.trim()) {
    return data.trim()
  }
  if (data && typeof data === 'object' && 'detail' in data) {
    const detail = data.detail
    if (typeof detail === 'string') return detail
    if (detail && typeof detail === 'object' && 'message' in detail && typeof detail.message === 'string') {
      return detail.message
    }
  }
  return fallback
}

export function createApiError(
  status: number,
  data: unknown,
  statusText: string,
  request: RequestInfo = {},
  cause?: unknown
): SentryApiError {
  const ErrorClass = errorClassFor(status)
  return new ErrorClass(status, extractDetail(data, statusText || 'Request failed'), request, data, cause)
}

function fromAxiosError(error: AxiosError): SentryError {
  const request: RequestInfo = {
    method: error.config?.method?.toUpperCase(),
    url: error.config?.url,
  }

  if (error.response) {
    return createApiError(error.response.status, error.response.data, error.response.statusText, request, error)
  }

  return new NetworkError(error.message, error.code, error)
}

/**
 * Normalize anything thrown during a request into a SentryError
 */
export function toSentryError(error: unknown): SentryError {
  if (error instanceof SentryError) return error

  if (isAxiosError(error)) return fromAxiosError(error)

  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    return new ResponseParseError('Response did not match the expected shape', issues, error)
  }

  if (error instanceof Error) return new SentryError(error.message, { cause: error })

  return new SentryError(String(error))
}
