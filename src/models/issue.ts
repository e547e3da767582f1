import { BaseModel } from './base.js'
import { Event } from './event.js'
import { issueChangesSchema, issueSchema } from './schemas.js'
import type { IssueRecord, IssueStatus } from './schemas.js'
import { segment } from '../client/transceiver.js'
import type { Sentry } from '../sentry.js'

export interface IssueUpdate {
  status?: IssueStatus
  /** Extra data for the status, e.g. `{ ignoreDuration: 30 }` */
  statusDetails?: Record<string, unknown>
  /** Actor id such as `user:42` or `team:7`; null unassigns */
  assignedTo?: string | null
  hasSeen?: boolean
  isBookmarked?: boolean
  isSubscribed?: boolean
  isPublic?: boolean
}

export interface EventListOptions {
  /** Return full event bodies instead of the summary form */
  full?: boolean
}

/**
 * A group of similar events.
 *
 * Issue records do not name their organization, so the slug is carried along
 * from whatever lookup produced the issue.
 */
export class Issue extends BaseModel<IssueRecord> {
  readonly organizationSlug: string

  constructor(sentry: Sentry, json: IssueRecord, organizationSlug: string) {
    super(sentry, json)
    this.organizationSlug = organizationSlug
  }

  static parse(sentry: Sentry, data: unknown, organizationSlug: string): Issue {
    return new Issue(sentry, issueSchema.parse(data), organizationSlug)
  }

  get id(): string {
    return this.json.id
  }

  get shortId(): string | undefined {
    return this.json.shortId
  }

  get title(): string {
    return this.json.title
  }

  get status(): string {
    return this.json.status
  }

  get projectSlug(): string | undefined {
    return this.json.project?.slug
  }

  private get path(): string {
    return `organizations/${segment(this.organizationSlug)}/issues/${segment(this.id)}/`
  }

  events(options: EventListOptions = {}): AsyncGenerator<Event, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}events/`, {
      params: { full: options.full ? 'true' : undefined },
      parse: (data) => Event.parse(this.sentry, data),
    })
  }

  latestEvent(): Promise<Event> {
    return this.transceiver.get(`${this.path}events/latest/`, {
      parse: (data) => Event.parse(this.sentry, data),
    })
  }

  /**
   * Apply changes and merge the values the API reports back into the record
   */
  async update(changes: IssueUpdate): Promise<this> {
    const reported = await this.transceiver.put(this.path, changes, {
      parse: (data) => issueChangesSchema.parse(data),
    })
    this.merge(reported, (data) => issueSchema.parse(data))
    return this
  }

  resolve(): Promise<this> {
    return this.update({ status: 'resolved' })
  }

  unresolve(): Promise<this> {
    return this.update({ status: 'unresolved' })
  }

  ignore(statusDetails?: Record<string, unknown>): Promise<this> {
    return this.update({ status: 'ignored', statusDetails })
  }

  delete(): Promise<void> {
    return this.transceiver.delete(this.path)
  }
}
