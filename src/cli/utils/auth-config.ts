/**
 * Auth Config Storage
 *
 * Stores auth tokens in ~/.sentry-rest/auth.json, keyed by service URL
 */

import { promises as fs } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'
import { z } from 'zod'
import { ConfigError } from '../../client/errors.js'
import { normalizeBaseUrl } from '../../client/transceiver.js'

const storedAuthSchema = z.object({
  token: z.string().min(1),
  organization: z.string().optional(),
  savedAt: z.string().optional(),
})

const storedConfigSchema = z.record(storedAuthSchema)

export type StoredAuth = z.infer<typeof storedAuthSchema>

export type StoredConfig = z.infer<typeof storedConfigSchema>

const CONFIG_DIR = join(homedir(), '.sentry-rest')
const AUTH_FILE = join(CONFIG_DIR, 'auth.json')

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export async function loadAuthConfig(authFile: string = AUTH_FILE): Promise<StoredConfig> {
  let content: string
  try {
    content = await fs.readFile(authFile, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) return {}
    throw error
  }

  let json: unknown
  try {
    json = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`${authFile} is not valid JSON`, { cause: error })
  }

  const parsed = storedConfigSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigError(`${authFile} has an unexpected format`, { cause: parsed.error })
  }
  return parsed.data
}

export async function saveAuthConfig(config: StoredConfig, authFile: string = AUTH_FILE): Promise<void> {
  await fs.mkdir(dirname(authFile), { recursive: true })
  await fs.writeFile(authFile, JSON.stringify(config, null, 2), 'utf-8')
  // Owner read/write only
  await fs.chmod(authFile, 0o600)
}

export async function getStoredAuth(baseUrl: string, authFile: string = AUTH_FILE): Promise<StoredAuth | null> {
  const config = await loadAuthConfig(authFile)
  return config[normalizeBaseUrl(baseUrl)] ?? null
}

export async function saveToken(
  baseUrl: string,
  token: string,
  organization?: string,
  authFile: string = AUTH_FILE
): Promise<void> {
  const config = await loadAuthConfig(authFile)
  config[normalizeBaseUrl(baseUrl)] = {
    token,
    organization,
    savedAt: new Date().toISOString(),
  }
  await saveAuthConfig(config, authFile)
}

/**
 * @returns whether a token was stored for the URL
 */
export async function clearToken(baseUrl: string, authFile: string = AUTH_FILE): Promise<boolean> {
  const config = await loadAuthConfig(authFile)
  const key = normalizeBaseUrl(baseUrl)
  if (!(key in config)) return false
  delete config[key]
  await saveAuthConfig(config, authFile)
  return true
}

export { AUTH_FILE, CONFIG_DIR }
