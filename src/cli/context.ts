/**
 * CLI Context
 *
 * Resolves global flags, environment and stored login into a ready client.
 * Token precedence: --token > SENTRY_AUTH_TOKEN > token saved by `login`.
 */

import chalk from 'chalk'
import { ConfigError } from '../client/errors.js'
import { DEFAULT_BASE_URL } from '../client/transceiver.js'
import { loadConfig } from '../config.js'
import { Sentry } from '../sentry.js'
import type { SentryOptions } from '../sentry.js'
import { getStoredAuth } from './utils/auth-config.js'

export type GlobalOptions = {
  url?: string
  token?: string
  verbose?: boolean
  json?: boolean
}

export interface CommandContext {
  sentry: Sentry
  /** Default organization from SENTRY_ORG or the stored login */
  organization?: string
  json: boolean
}

export interface ContextSources {
  env?: Record<string, string | undefined>
  authFile?: string
  /** Extra client options, e.g. an adapter in tests */
  client?: Omit<SentryOptions, 'token' | 'baseUrl' | 'timeout'>
}

export function verboseHooks(): Pick<SentryOptions, 'onRequest' | 'onResponse' | 'onError'> {
  return {
    onResponse: (event) => {
      console.error(chalk.dim(`${event.method} ${event.url} ${event.status} ${event.durationMs}ms`))
    },
    onError: (error) => {
      console.error(chalk.dim(`${error.name}: ${error.message}`))
    },
  }
}

export async function createContext(options: GlobalOptions, sources: ContextSources = {}): Promise<CommandContext> {
  const env = sources.env ?? process.env
  const baseUrl = options.url || env.SENTRY_URL || DEFAULT_BASE_URL
  const stored = await getStoredAuth(baseUrl, sources.authFile)

  const settings = loadConfig(env, {
    token: options.token || env.SENTRY_AUTH_TOKEN || stored?.token,
    baseUrl,
    organization: env.SENTRY_ORG || stored?.organization,
  })

  const sentry = new Sentry({
    ...(options.verbose ? verboseHooks() : {}),
    ...sources.client,
    token: settings.token,
    baseUrl: settings.baseUrl,
    timeout: settings.timeout,
  })

  return { sentry, organization: settings.organization, json: options.json ?? false }
}

export function requireOrganization(context: CommandContext, explicit?: string): string {
  const organization = explicit || context.organization
  if (!organization) {
    throw new ConfigError('No organization: pass --org or set SENTRY_ORG')
  }
  return organization
}
