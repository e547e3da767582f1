/**
 * Event Model Tests
 *
 * Also covers the raw record access every model inherits.
 */

import { describe, it, expect } from 'vitest'
import { MissingAttributeError, ResponseParseError } from '../../src/client/errors.js'
import { Event } from '../../src/models/event.js'
import { createTestClient } from '../helpers/mock-adapter.js'
import { eventRecord } from '../helpers/records.js'

function parse(data: unknown): Event {
  const { sentry } = createTestClient([])
  return Event.parse(sentry, data)
}

describe('Event', () => {
  it('turns the tag list into a lookup', () => {
    expect(parse(eventRecord).tags).toEqual({
      environment: 'production',
      level: 'error',
      release: '1.0.0',
    })
  })

  it('keeps the last value of a repeated tag', () => {
    const event = parse({
      ...eventRecord,
      tags: [
        { key: 'browser', value: 'Firefox' },
        { key: 'browser', value: 'Chrome' },
      ],
    })

    expect(event.tags).toEqual({ browser: 'Chrome' })
  })

  it('defaults to no tags', () => {
    expect(parse({ id: 1 }).tags).toEqual({})
  })

  it('parses the creation date', () => {
    expect(parse(eventRecord).dateCreated).toEqual(new Date('2024-03-01T12:30:00Z'))
  })

  it('normalizes numeric ids to strings', () => {
    expect(parse({ ...eventRecord, id: 9001 }).id).toBe('9001')
  })

  describe('raw access', () => {
    it('returns values by key', () => {
      const event = parse({ ...eventRecord, 'user agent': 'curl/8.0' })

      expect(event.get('groupID')).toBe('5001')
      expect(event.get('user agent')).toBe('curl/8.0')
      expect(event.has('user agent')).toBe(true)
    })

    it('throws for a missing key', () => {
      const event = parse(eventRecord)

      expect(event.has('nope')).toBe(false)
      expect(() => event.get('nope')).toThrow(MissingAttributeError)
      expect(() => event.get('nope')).toThrow("Event has no attribute 'nope'")
    })

    it('does not count inherited properties as keys', () => {
      const event = parse(eventRecord)

      expect(event.has('toString')).toBe(false)
      expect(event.has('constructor')).toBe(false)
      expect(() => event.get('constructor')).toThrow(MissingAttributeError)
    })

    it('serializes to its record', () => {
      const event = parse(eventRecord)

      expect(JSON.parse(JSON.stringify(event))).toEqual(eventRecord)
    })
  })

  it('rejects records without an id through the transceiver', async () => {
    const { sentry } = createTestClient([{ data: { title: 'no id' } }])

    await expect(
      sentry.transceiver.get('projects/acme/backend/events/x/', { parse: (data) => Event.parse(sentry, data) })
    ).rejects.toBeInstanceOf(ResponseParseError)
  })
})
