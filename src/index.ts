/**
 * sentry-rest-client
 *
 * Typed client for the Sentry REST API: organizations, teams, projects,
 * issues, events and integrations
 */

export { Sentry, collect } from './sentry.js'
export type { SentryOptions } from './sentry.js'

export { Transceiver, DEFAULT_BASE_URL, DEFAULT_TIMEOUT, normalizeBaseUrl, normalizePath } from './client/transceiver.js'
export type {
  TransceiverConfig,
  RequestEvent,
  ResponseEvent,
  RequestOptions,
  ParsedRequestOptions,
  QueryParams,
  Parser,
} from './client/types.js'
export { parseLinkHeader, nextCursor } from './client/pagination.js'
export type { LinkEntry } from './client/pagination.js'
export * from './client/errors.js'

export { loadConfig } from './config.js'
export type { ClientSettings, ConfigOverrides } from './config.js'

export * from './models/index.js'
