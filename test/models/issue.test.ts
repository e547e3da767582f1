/**
 * Issue Model Tests
 */

import { describe, it, expect } from 'vitest'
import { Issue } from '../../src/models/issue.js'
import { collect } from '../../src/sentry.js'
import { createTestClient, lastPageLink, nextPageLink } from '../helpers/mock-adapter.js'
import type { MockResponse } from '../helpers/mock-adapter.js'
import { eventRecord, issueRecord } from '../helpers/records.js'

const ISSUE_URL = 'https://sentry.io/api/0/organizations/acme/issues/5001/'

function setup(responses: MockResponse[]) {
  const { sentry, requests } = createTestClient(responses)
  const issue = Issue.parse(sentry, issueRecord, 'acme')
  return { issue, requests }
}

describe('Issue', () => {
  it('exposes typed fields and raw keys', () => {
    const { issue } = setup([])

    expect(issue.shortId).toBe('BACKEND-1')
    expect(issue.status).toBe('unresolved')
    expect(issue.projectSlug).toBe('backend')
    expect(issue.get('first seen release')).toBe('1.0.0')
  })

  it('pages through its events', async () => {
    const { issue, requests } = setup([
      { data: [eventRecord], headers: { link: nextPageLink(`${ISSUE_URL}events/`, '0:1:0') } },
      { data: [{ ...eventRecord, id: '9002' }], headers: { link: lastPageLink(`${ISSUE_URL}events/`, '0:2:0') } },
    ])

    const events = await collect(issue.events())

    expect(events.map((event) => event.id)).toEqual(['9001', '9002'])
    expect(requests.map((request) => request.url)).toEqual([
      `${ISSUE_URL}events/`,
      `${ISSUE_URL}events/?cursor=0:1:0`,
    ])
  })

  it('fetches the latest event', async () => {
    const { issue, requests } = setup([{ data: eventRecord }])

    const event = await issue.latestEvent()

    expect(event.title).toBe('TypeError: cannot read properties of undefined')
    expect(requests[0].url).toBe(`${ISSUE_URL}events/latest/`)
  })

  it('merges reported changes into its record', async () => {
    const { issue, requests } = setup([{ data: { status: 'resolved', statusDetails: {} } }])

    await issue.resolve()

    expect(issue.status).toBe('resolved')
    expect(issue.title).toBe('TypeError: cannot read properties of undefined')
    expect(requests[0].method).toBe('PUT')
    expect(requests[0].url).toBe(ISSUE_URL)
    expect(requests[0].body).toEqual({ status: 'resolved' })
  })

  it('ignores with status details', async () => {
    const { issue, requests } = setup([{ data: { status: 'ignored', statusDetails: { ignoreDuration: 30 } } }])

    await issue.ignore({ ignoreDuration: 30 })

    expect(issue.status).toBe('ignored')
    expect(requests[0].body).toEqual({ status: 'ignored', statusDetails: { ignoreDuration: 30 } })
  })

  it('assigns and bookmarks', async () => {
    const { issue, requests } = setup([{ data: { assignedTo: { type: 'user', id: '42' }, isBookmarked: true } }])

    await issue.update({ assignedTo: 'user:42', isBookmarked: true })

    expect(issue.get('isBookmarked')).toBe(true)
    expect(requests[0].body).toEqual({ assignedTo: 'user:42', isBookmarked: true })
  })

  it('deletes itself', async () => {
    const { issue, requests } = setup([{ status: 202 }])

    await issue.delete()

    expect(requests[0].method).toBe('DELETE')
    expect(requests[0].url).toBe(ISSUE_URL)
  })
})
