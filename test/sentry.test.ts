/**
 * Sentry Root Client Tests
 */

import { describe, it, expect } from 'vitest'
import { ConfigError, NotFoundError } from '../src/client/errors.js'
import { Organization } from '../src/models/organization.js'
import { Project } from '../src/models/project.js'
import { Sentry, collect } from '../src/sentry.js'
import { createTestClient, nextPageLink } from './helpers/mock-adapter.js'
import { issueRecord, organizationRecord, projectRecord, teamRecord } from './helpers/records.js'

describe('Sentry', () => {
  it('looks up an organization by slug', async () => {
    const { sentry, requests } = createTestClient([{ data: organizationRecord }])

    const organization = await sentry.organization('acme')

    expect(organization).toBeInstanceOf(Organization)
    expect(organization.slug).toBe('acme')
    expect(organization.name).toBe('Acme')
    expect(organization.sentry).toBe(sentry)
    expect(requests[0].url).toBe('https://sentry.io/api/0/organizations/acme/')
  })

  it('escapes slugs used as path segments', async () => {
    const { sentry, requests } = createTestClient([{ data: organizationRecord }])

    await sentry.organization('a/b')

    expect(requests[0].url).toBe('https://sentry.io/api/0/organizations/a%2Fb/')
  })

  it('looks up a project', async () => {
    const { sentry, requests } = createTestClient([{ data: projectRecord }])

    const project = await sentry.project('acme', 'backend')

    expect(project).toBeInstanceOf(Project)
    expect(project.organizationSlug).toBe('acme')
    expect(requests[0].url).toBe('https://sentry.io/api/0/projects/acme/backend/')
  })

  it('iterates over all projects across pages', async () => {
    const url = 'https://sentry.io/api/0/projects/'
    const { sentry, requests } = createTestClient([
      { data: [projectRecord], headers: { link: nextPageLink(url, '0:1:0') } },
      { data: [{ ...projectRecord, id: '101', slug: 'frontend', name: 'Frontend' }] },
    ])

    const projects = await collect(sentry.projects())

    expect(projects.map((project) => project.slug)).toEqual(['backend', 'frontend'])
    expect(requests).toHaveLength(2)
  })

  it('looks up a team and remembers the organization', async () => {
    const { sentry, requests } = createTestClient([{ data: teamRecord }])

    const team = await sentry.team('acme', 'platform')

    expect(team.organizationSlug).toBe('acme')
    expect(requests[0].url).toBe('https://sentry.io/api/0/teams/acme/platform/')
  })

  it('looks up an issue within an organization', async () => {
    const { sentry, requests } = createTestClient([{ data: issueRecord }])

    const issue = await sentry.issue('acme', 5001)

    expect(issue.id).toBe('5001')
    expect(issue.organizationSlug).toBe('acme')
    expect(requests[0].url).toBe('https://sentry.io/api/0/organizations/acme/issues/5001/')
  })

  it('propagates API errors', async () => {
    const { sentry } = createTestClient([{ status: 404, data: { detail: 'The requested resource does not exist' } }])

    await expect(sentry.organization('missing')).rejects.toBeInstanceOf(NotFoundError)
  })

  describe('fromEnv', () => {
    it('builds a client from environment variables', () => {
      const sentry = Sentry.fromEnv({ SENTRY_AUTH_TOKEN: 'test-token', SENTRY_URL: 'https://sentry.example.com/' })

      expect(sentry.baseUrl).toBe('https://sentry.example.com')
      expect(sentry.transceiver.token).toBe('test-token')
    })

    it('fails without a token', () => {
      expect(() => Sentry.fromEnv({})).toThrow(ConfigError)
    })
  })
})

describe('collect', () => {
  async function* numbers() {
    yield 1
    yield 2
    yield 3
  }

  it('drains an iterator', async () => {
    expect(await collect(numbers())).toEqual([1, 2, 3])
  })

  it('stops at the limit', async () => {
    expect(await collect(numbers(), 2)).toEqual([1, 2])
  })
})
