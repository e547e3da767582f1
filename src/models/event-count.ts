import { eventCountsSchema } from './schemas.js'
import { InvalidArgumentError } from '../client/errors.js'

/** Number of events received in the bucket starting at `timestamp` */
export interface EventCount {
  timestamp: Date
  count: number
}

/**
 * Bucket sizes the project stats endpoint aggregates by
 */
export const EventResolution = {
  SECONDS: '10s',
  HOUR: '1h',
  DAY: '1d',
} as const

export type EventResolution = (typeof EventResolution)[keyof typeof EventResolution]

/** Which counter the stats endpoint reports */
export type EventStat = 'received' | 'rejected' | 'blacklisted' | 'generated'

export function parseEventCounts(data: unknown): EventCount[] {
  return eventCountsSchema.parse(data).map(([seconds, count]) => ({
    timestamp: new Date(seconds * 1000),
    count,
  }))
}

/** Seconds since the epoch, the unit the stats endpoint takes for `since`/`until` */
export function toEpochSeconds(value: Date | number): number {
  const seconds = value instanceof Date ? value.getTime() / 1000 : value
  if (!Number.isFinite(seconds)) {
    throw new InvalidArgumentError(`Not a valid point in time: ${String(value)}`)
  }
  return Math.floor(seconds)
}
