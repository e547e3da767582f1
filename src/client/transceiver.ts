/**
 * Transceiver
 *
 * Axios-backed HTTP layer shared by the root client and every model.
 * Handles auth header injection, the `/api/0/` prefix, response validation,
 * error mapping and cursor pagination.
 */

import axios from 'axios'
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios'
import { ConfigError, ResponseParseError, createApiError, toSentryError } from './errors.js'
import type { SentryError } from './errors.js'
import { nextCursor } from './pagination.js'
import type {
  HttpMethod,
  ParsedRequestOptions,
  Parser,
  QueryParams,
  RawRequestOptions,
  RawResponse,
  RequestOptions,
  TransceiverConfig,
} from './types.js'

export const DEFAULT_BASE_URL = 'https://sentry.io'
export const DEFAULT_TIMEOUT = 10000
const API_PREFIX = '/api/0/'

/**
 * Strip trailing slashes and a pasted `/api/0` suffix from a base URL
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, '').replace(/\/api\/0$/, '')
}

/**
 * Endpoint paths are relative to `/api/0/` and must end with a slash
 *
 * @example
 * normalizePath('/organizations/acme') // => 'organizations/acme/'
 */
export function normalizePath(path: string): string {
  const trimmed = path.replace(/^\/+/, '')
  const queryStart = trimmed.indexOf('?')
  const pathname = queryStart === -1 ? trimmed : trimmed.slice(0, queryStart)
  const query = queryStart === -1 ? '' : trimmed.slice(queryStart)
  return `${pathname.endsWith('/') ? pathname : `${pathname}/`}${query}`
}

/**
 * Drop unset parameters so they never reach the query string
 */
export function compactParams(params?: QueryParams): QueryParams | undefined {
  if (!params) return undefined
  const compact: QueryParams = {}
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      compact[key] = value
    }
  }
  return compact
}

/**
 * Encode a value for use as a single path segment
 */
export function segment(value: string | number): string {
  return encodeURIComponent(String(value))
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      flat[key.toLowerCase()] = value
    } else if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.join(', ')
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      flat[key.toLowerCase()] = String(value)
    }
  }
  return flat
}

export class Transceiver {
  private client: AxiosInstance
  private config: TransceiverConfig
  readonly baseUrl: string
  readonly token: string

  constructor(config: TransceiverConfig) {
    if (!config.token || !config.token.trim()) {
      throw new ConfigError('An auth token is required')
    }
    this.config = config
    this.token = config.token.trim()
    this.baseUrl = normalizeBaseUrl(config.baseUrl || DEFAULT_BASE_URL)
    this.client = this.createAxiosInstance()
  }

  private createAxiosInstance(): AxiosInstance {
    return axios.create({
      baseURL: `${this.baseUrl}${API_PREFIX}`,
      timeout: this.config.timeout ?? DEFAULT_TIMEOUT,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...this.config.defaultHeaders,
        Authorization: `Bearer ${this.token}`,
      },
      // `id=1&id=2`, the form the bulk endpoints expect
      paramsSerializer: { indexes: null },
      // Status codes are mapped to typed errors below
      validateStatus: () => true,
      adapter: this.config.adapter,
    })
  }

  /**
   * Absolute URL a request would hit, including query parameters
   */
  url(path: string, options: RequestOptions = {}): string {
    return this.client.getUri({ url: normalizePath(path), params: compactParams(options.params) })
  }

  async request(method: HttpMethod, path: string, options: RawRequestOptions = {}): Promise<RawResponse> {
    const config: AxiosRequestConfig = {
      method,
      url: normalizePath(path),
      params: compactParams(options.params),
      data: options.data,
      headers: options.headers,
      signal: options.signal,
    }
    const event = { method, url: this.client.getUri(config) }

    try {
      this.config.onRequest?.(event)
      const started = Date.now()
      const response = await this.client.request<unknown>(config)
      this.config.onResponse?.({ ...event, status: response.status, durationMs: Date.now() - started })

      if (response.status < 200 || response.status >= 300) {
        throw createApiError(response.status, response.data, response.statusText, event)
      }

      return {
        status: response.status,
        data: response.status === 204 ? undefined : response.data,
        headers: flattenHeaders(response.headers),
      }
    } catch (error) {
      throw this.handleError(error)
    }
  }

  private handleError(error: unknown): SentryError {
    const sentryError = toSentryError(error)
    this.config.onError?.(sentryError)
    return sentryError
  }

  private parse<T>(parse: Parser<T>, data: unknown): T {
    try {
      return parse(data)
    } catch (error) {
      throw this.handleError(error)
    }
  }

  async get<T>(path: string, options: ParsedRequestOptions<T>): Promise<T> {
    const response = await this.request('GET', path, options)
    return this.parse(options.parse, response.data)
  }

  async post<T>(path: string, data: unknown, options: ParsedRequestOptions<T>): Promise<T> {
    const response = await this.request('POST', path, { ...options, data })
    return this.parse(options.parse, response.data)
  }

  async put<T>(path: string, data: unknown, options: ParsedRequestOptions<T>): Promise<T> {
    const response = await this.request('PUT', path, { ...options, data })
    return this.parse(options.parse, response.data)
  }

  async delete(path: string, options: RequestOptions = {}): Promise<void> {
    await this.request('DELETE', path, options)
  }

  /**
   * Iterate over every item of a list endpoint, fetching pages on demand
   *
   * @example
   * for await (const project of transceiver.paginateGet('projects', { parse: toProject })) {
   *   console.log(project.slug)
   * }
   */
  async *paginateGet<T>(path: string, options: ParsedRequestOptions<T>): AsyncGenerator<T, void, undefined> {
    let cursor: string | null = null

    do {
      const params = cursor === null ? options.params : { ...options.params, cursor }
      const response = await this.request('GET', path, { ...options, params })

      if (!Array.isArray(response.data)) {
        throw this.handleError(new ResponseParseError(`Expected a list from ${this.url(path, { params })}`))
      }

      for (const item of response.data) {
        yield this.parse(options.parse, item)
      }

      cursor = nextCursor(response.headers['link'])
    } while (cursor !== null)
  }
}
