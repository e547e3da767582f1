/**
 * Client Configuration
 *
 * Settings come from explicit overrides first, then the environment:
 *
 *   SENTRY_AUTH_TOKEN  bearer token (required)
 *   SENTRY_URL         service root, default https://sentry.io
 *   SENTRY_TIMEOUT     request timeout in milliseconds
 *   SENTRY_ORG         default organization slug for the CLI
 */

import { z } from 'zod'
import { ConfigError } from './client/errors.js'
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT, normalizeBaseUrl } from './client/transceiver.js'

export interface ClientSettings {
  token: string
  baseUrl: string
  timeout: number
  organization?: string
}

const emptyAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value)

const envSchema = z.object({
  SENTRY_AUTH_TOKEN: z.preprocess(emptyAsUnset, z.string().trim().optional()),
  SENTRY_URL: z.preprocess(emptyAsUnset, z.string().trim().url().optional()),
  SENTRY_TIMEOUT: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().optional()),
  SENTRY_ORG: z.preprocess(emptyAsUnset, z.string().trim().optional()),
})

const overridesSchema = z.object({
  token: z.preprocess(emptyAsUnset, z.string().trim().optional()),
  baseUrl: z.preprocess(emptyAsUnset, z.string().trim().url().optional()),
  timeout: z.number().int().positive().optional(),
  organization: z.preprocess(emptyAsUnset, z.string().trim().optional()),
})

export type ConfigOverrides = Partial<ClientSettings>

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): ClientSettings {
  const parsedEnv = envSchema.safeParse(env)
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsedEnv.error)}`)
  }

  const parsedOverrides = overridesSchema.safeParse(overrides)
  if (!parsedOverrides.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsedOverrides.error)}`)
  }

  const fromEnv = parsedEnv.data
  const explicit = parsedOverrides.data

  const token = explicit.token ?? fromEnv.SENTRY_AUTH_TOKEN
  if (!token) {
    throw new ConfigError('No auth token: set SENTRY_AUTH_TOKEN or pass a token explicitly')
  }

  return {
    token,
    baseUrl: normalizeBaseUrl(explicit.baseUrl ?? fromEnv.SENTRY_URL ?? DEFAULT_BASE_URL),
    timeout: explicit.timeout ?? fromEnv.SENTRY_TIMEOUT ?? DEFAULT_TIMEOUT,
    organization: explicit.organization ?? fromEnv.SENTRY_ORG,
  }
}
