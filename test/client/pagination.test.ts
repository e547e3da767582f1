/**
 * Pagination Tests
 *
 * Tests for Link header parsing and next-cursor detection.
 */

import { describe, it, expect } from 'vitest'
import { nextCursor, parseLinkHeader } from '../../src/client/pagination.js'

const MIDDLE_PAGE =
  '<https://sentry.io/api/0/projects/?&cursor=0:0:1>; rel="previous"; results="true"; cursor="0:0:1", ' +
  '<https://sentry.io/api/0/projects/?&cursor=0:200:0>; rel="next"; results="true"; cursor="0:200:0"'

const LAST_PAGE =
  '<https://sentry.io/api/0/projects/?&cursor=0:100:1>; rel="previous"; results="true"; cursor="0:100:1", ' +
  '<https://sentry.io/api/0/projects/?&cursor=0:300:0>; rel="next"; results="false"; cursor="0:300:0"'

describe('parseLinkHeader', () => {
  it('parses both entries of a Link header', () => {
    expect(parseLinkHeader(MIDDLE_PAGE)).toEqual([
      {
        url: 'https://sentry.io/api/0/projects/?&cursor=0:0:1',
        rel: 'previous',
        results: true,
        cursor: '0:0:1',
      },
      {
        url: 'https://sentry.io/api/0/projects/?&cursor=0:200:0',
        rel: 'next',
        results: true,
        cursor: '0:200:0',
      },
    ])
  })

  it('returns no entries for a missing header', () => {
    expect(parseLinkHeader(undefined)).toEqual([])
    expect(parseLinkHeader('')).toEqual([])
  })

  it('skips entries without a rel parameter', () => {
    expect(parseLinkHeader('<https://example.com/>; results="true"')).toEqual([])
  })

  it('treats a missing results parameter as no results', () => {
    const [entry] = parseLinkHeader('<https://example.com/?cursor=1:0:0>; rel="next"; cursor="1:0:0"')
    expect(entry.results).toBe(false)
    expect(entry.cursor).toBe('1:0:0')
  })
})

describe('nextCursor', () => {
  it('returns the cursor of the next page while results remain', () => {
    expect(nextCursor(MIDDLE_PAGE)).toBe('0:200:0')
  })

  it('returns null on the last page', () => {
    expect(nextCursor(LAST_PAGE)).toBeNull()
  })

  it('returns null without a Link header', () => {
    expect(nextCursor(undefined)).toBeNull()
  })
})
