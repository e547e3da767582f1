/**
 * Login Command
 *
 * Verify a token against the API and save it for future use
 */

import chalk from 'chalk'
import { collect } from '../../sentry.js'
import type { CommandContext } from '../context.js'
import { clearToken, saveToken } from '../utils/auth-config.js'

export interface LoginOptions {
  org?: string
}

export async function loginCommand(context: CommandContext, options: LoginOptions, authFile?: string): Promise<void> {
  const { sentry } = context

  // Any authenticated call will do; a bad token fails with AuthenticationError
  const organizations = await collect(sentry.organizations())

  if (options.org && !organizations.some((organization) => organization.slug === options.org)) {
    console.log(chalk.yellow(`Warning: the token has no access to organization '${options.org}'`))
  }

  await saveToken(sentry.baseUrl, sentry.transceiver.token, options.org, authFile)

  console.log(chalk.green(`Logged in to ${sentry.baseUrl}`))
  if (organizations.length > 0) {
    console.log(`Organizations: ${organizations.map((organization) => organization.slug).join(', ')}`)
  }
}

export async function logoutCommand(baseUrl: string, authFile?: string): Promise<void> {
  const removed = await clearToken(baseUrl, authFile)
  console.log(removed ? `Logged out from ${baseUrl}` : chalk.dim(`No saved token for ${baseUrl}`))
}
