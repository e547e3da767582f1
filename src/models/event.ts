import { BaseModel } from './base.js'
import { eventSchema } from './schemas.js'
import type { EventRecord } from './schemas.js'
import type { Sentry } from '../sentry.js'

export class Event extends BaseModel<EventRecord> {
  static parse(sentry: Sentry, data: unknown): Event {
    return new Event(sentry, eventSchema.parse(data))
  }

  get id(): string {
    return this.json.id
  }

  /** 32 character hex id assigned by the SDK that sent the event */
  get eventId(): string | undefined {
    return this.json.eventID
  }

  get title(): string | undefined {
    return this.json.title
  }

  get message(): string | null | undefined {
    return this.json.message
  }

  get dateCreated(): Date | undefined {
    return this.json.dateCreated ? new Date(this.json.dateCreated) : undefined
  }

  /**
   * Tags as a plain lookup, e.g. `{ environment: 'production', level: 'error' }`.
   * A key that occurs twice keeps its last value.
   */
  get tags(): Record<string, string | null> {
    const tags: Record<string, string | null> = {}
    for (const tag of this.json.tags) {
      tags[tag.key] = tag.value
    }
    return tags
  }
}
