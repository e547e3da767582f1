/**
 * Sentry
 *
 * Entry point of the client. Owns the transceiver every model talks through
 * and offers the top-level lookups.
 *
 * @example
 * ```typescript
 * const sentry = new Sentry({ token: process.env.SENTRY_AUTH_TOKEN ?? '' })
 *
 * const project = await sentry.project('acme', 'backend')
 * for await (const issue of project.issues({ query: 'is:unresolved' })) {
 *   console.log(issue.shortId, issue.title)
 * }
 * ```
 */

import { Transceiver, segment } from './client/transceiver.js'
import type { TransceiverConfig } from './client/types.js'
import { loadConfig } from './config.js'
import type { ConfigOverrides } from './config.js'
import { Issue } from './models/issue.js'
import { Organization } from './models/organization.js'
import { Project } from './models/project.js'
import { Team } from './models/team.js'

export type SentryOptions = TransceiverConfig

export class Sentry {
  readonly transceiver: Transceiver

  constructor(options: SentryOptions) {
    this.transceiver = new Transceiver(options)
  }

  /**
   * Build a client from SENTRY_* environment variables
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    overrides: Omit<ConfigOverrides, 'organization'> & Omit<TransceiverConfig, 'token' | 'baseUrl' | 'timeout'> = {}
  ): Sentry {
    const { token, baseUrl, timeout, ...rest } = overrides
    const settings = loadConfig(env, { token, baseUrl, timeout })
    return new Sentry({ ...rest, token: settings.token, baseUrl: settings.baseUrl, timeout: settings.timeout })
  }

  get baseUrl(): string {
    return this.transceiver.baseUrl
  }

  organization(organizationSlug: string): Promise<Organization> {
    return this.transceiver.get(`organizations/${segment(organizationSlug)}/`, {
      parse: (data) => Organization.parse(this, data),
    })
  }

  /** Organizations the token has access to */
  organizations(): AsyncGenerator<Organization, void, undefined> {
    return this.transceiver.paginateGet('organizations/', {
      parse: (data) => Organization.parse(this, data),
    })
  }

  project(organizationSlug: string, projectSlug: string): Promise<Project> {
    return this.transceiver.get(`projects/${segment(organizationSlug)}/${segment(projectSlug)}/`, {
      parse: (data) => Project.parse(this, data, organizationSlug),
    })
  }

  /** Every project the token has access to, across organizations */
  projects(): AsyncGenerator<Project, void, undefined> {
    return this.transceiver.paginateGet('projects/', {
      parse: (data) => Project.parse(this, data),
    })
  }

  team(organizationSlug: string, teamSlug: string): Promise<Team> {
    return this.transceiver.get(`teams/${segment(organizationSlug)}/${segment(teamSlug)}/`, {
      parse: (data) => Team.parse(this, data, organizationSlug),
    })
  }

  issue(organizationSlug: string, issueId: string | number): Promise<Issue> {
    return this.transceiver.get(`organizations/${segment(organizationSlug)}/issues/${segment(issueId)}/`, {
      parse: (data) => Issue.parse(this, data, organizationSlug),
    })
  }
}

/**
 * Drain an async iterator into an array, stopping after `limit` items when given
 */
export async function collect<T>(iterable: AsyncIterable<T>, limit?: number): Promise<T[]> {
  const items: T[] = []
  if (limit !== undefined && limit <= 0) return items
  for await (const item of iterable) {
    items.push(item)
    if (limit !== undefined && items.length >= limit) break
  }
  return items
}
