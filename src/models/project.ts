import { BaseModel } from './base.js'
import { Event } from './event.js'
import type { EventListOptions } from './issue.js'
import { Issue } from './issue.js'
import type { IssueUpdate } from './issue.js'
import { EventResolution, parseEventCounts, toEpochSeconds } from './event-count.js'
import type { EventCount, EventStat } from './event-count.js'
import { changesSchema, issueChangesSchema, projectSchema } from './schemas.js'
import type { IssueChanges, ProjectRecord } from './schemas.js'
import { InvalidArgumentError, MissingAttributeError } from '../client/errors.js'
import { segment } from '../client/transceiver.js'
import type { Sentry } from '../sentry.js'

export interface IssueListOptions {
  /** Search query, e.g. `is:unresolved level:error` */
  query?: string
  /** Time window such as `24h` or `14d` */
  statsPeriod?: string
}

export interface EventCountOptions {
  stat?: EventStat
  resolution?: EventResolution
  since?: Date | number
  until?: Date | number
}

export interface ProjectUpdate {
  name?: string
  slug?: string
  platform?: string
  isBookmarked?: boolean
}

export class Project extends BaseModel<ProjectRecord> {
  static readonly EventResolution = EventResolution

  private readonly fallbackOrganizationSlug?: string

  /**
   * @param organizationSlug - used when the record has no `organization` key,
   *   as in the team project listings
   */
  constructor(sentry: Sentry, json: ProjectRecord, organizationSlug?: string) {
    super(sentry, json)
    this.fallbackOrganizationSlug = organizationSlug
  }

  static parse(sentry: Sentry, data: unknown, organizationSlug?: string): Project {
    return new Project(sentry, projectSchema.parse(data), organizationSlug)
  }

  get id(): string {
    return this.json.id
  }

  get slug(): string {
    return this.json.slug
  }

  get name(): string {
    return this.json.name
  }

  get platform(): string | null | undefined {
    return this.json.platform
  }

  get organizationSlug(): string {
    const slug = this.json.organization?.slug ?? this.fallbackOrganizationSlug
    if (!slug) {
      throw new MissingAttributeError('Project', 'organization')
    }
    return slug
  }

  private get path(): string {
    return `projects/${segment(this.organizationSlug)}/${segment(this.slug)}/`
  }

  issues(options: IssueListOptions = {}): AsyncGenerator<Issue, void, undefined> {
    const organizationSlug = this.organizationSlug
    return this.transceiver.paginateGet(`${this.path}issues/`, {
      params: { query: options.query, statsPeriod: options.statsPeriod },
      parse: (data) => Issue.parse(this.sentry, data, organizationSlug),
    })
  }

  events(options: EventListOptions = {}): AsyncGenerator<Event, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}events/`, {
      params: { full: options.full ? 'true' : undefined },
      parse: (data) => Event.parse(this.sentry, data),
    })
  }

  event(eventId: string): Promise<Event> {
    return this.transceiver.get(`${this.path}events/${segment(eventId)}/`, {
      parse: (data) => Event.parse(this.sentry, data),
    })
  }

  /**
   * Event counts over time, oldest bucket first
   *
   * @example
   * const counts = await project.eventCounts({ resolution: Project.EventResolution.HOUR })
   */
  async eventCounts(options: EventCountOptions = {}): Promise<EventCount[]> {
    return this.transceiver.get(`${this.path}stats/`, {
      params: {
        stat: options.stat,
        resolution: options.resolution,
        since: options.since === undefined ? undefined : toEpochSeconds(options.since),
        until: options.until === undefined ? undefined : toEpochSeconds(options.until),
      },
      parse: parseEventCounts,
    })
  }

  /**
   * Apply the same changes to several issues of this project in one request
   *
   * @returns the fields the API reports as changed
   */
  async updateIssues(issueIds: ReadonlyArray<string | number>, changes: IssueUpdate): Promise<IssueChanges> {
    return this.transceiver.put(`${this.path}issues/`, changes, {
      params: { id: this.requireIds(issueIds) },
      parse: (data) => issueChangesSchema.parse(data),
    })
  }

  async deleteIssues(issueIds: ReadonlyArray<string | number>): Promise<void> {
    return this.transceiver.delete(`${this.path}issues/`, {
      params: { id: this.requireIds(issueIds) },
    })
  }

  // Without ids the bulk endpoints act on every issue of the project
  private requireIds(issueIds: ReadonlyArray<string | number>): string[] {
    if (issueIds.length === 0) {
      throw new InvalidArgumentError('At least one issue id is required')
    }
    return issueIds.map(String)
  }

  async update(changes: ProjectUpdate): Promise<this> {
    const updated = await this.transceiver.put(this.path, changes, {
      parse: (data) => changesSchema.parse(data),
    })
    this.merge(updated, (data) => projectSchema.parse(data))
    return this
  }

  delete(): Promise<void> {
    return this.transceiver.delete(this.path)
  }
}
