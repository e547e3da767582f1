/**
 * Transceiver Types
 *
 * Configuration and utility types for the HTTP layer
 */

import type { AxiosAdapter } from 'axios'
import type { SentryError } from './errors.js'

export interface TransceiverConfig {
  /** Auth token sent as `Authorization: Bearer <token>` */
  token: string
  /** Service root without the `/api/0` prefix (default: https://sentry.io) */
  baseUrl?: string
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number
  defaultHeaders?: Record<string, string>
  /** Replaces the axios transport, e.g. to serve responses in process */
  adapter?: AxiosAdapter
  onRequest?: (event: RequestEvent) => void
  onResponse?: (event: ResponseEvent) => void
  onError?: (error: SentryError) => void
}

export interface RequestEvent {
  method: string
  url: string
}

export interface ResponseEvent extends RequestEvent {
  status: number
  durationMs: number
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type QueryValue = string | number | boolean | null | undefined | ReadonlyArray<string | number>

export type QueryParams = Record<string, QueryValue>

/** Validates an unknown JSON value into T, throwing when it does not fit */
export type Parser<T> = (data: unknown) => T

export interface RequestOptions {
  params?: QueryParams
  headers?: Record<string, string>
  signal?: AbortSignal
}

export interface ParsedRequestOptions<T> extends RequestOptions {
  parse: Parser<T>
}

export interface RawRequestOptions extends RequestOptions {
  data?: unknown
}

export interface RawResponse {
  status: number
  data: unknown
  headers: Record<string, string>
}
