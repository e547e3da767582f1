import { BaseModel } from './base.js'
import { Project } from './project.js'
import { changesSchema, teamSchema } from './schemas.js'
import type { TeamRecord } from './schemas.js'
import { MissingAttributeError } from '../client/errors.js'
import { segment } from '../client/transceiver.js'
import type { Sentry } from '../sentry.js'

export interface TeamUpdate {
  name?: string
  slug?: string
}

export interface ProjectCreate {
  name: string
  /** Derived from the name by the API when omitted */
  slug?: string
  platform?: string
  defaultRules?: boolean
}

export class Team extends BaseModel<TeamRecord> {
  private readonly fallbackOrganizationSlug?: string

  constructor(sentry: Sentry, json: TeamRecord, organizationSlug?: string) {
    super(sentry, json)
    this.fallbackOrganizationSlug = organizationSlug
  }

  static parse(sentry: Sentry, data: unknown, organizationSlug?: string): Team {
    return new Team(sentry, teamSchema.parse(data), organizationSlug)
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

  get organizationSlug(): string {
    const slug = this.json.organization?.slug ?? this.fallbackOrganizationSlug
    if (!slug) {
      throw new MissingAttributeError('Team', 'organization')
    }
    return slug
  }

  private get path(): string {
    return `teams/${segment(this.organizationSlug)}/${segment(this.slug)}/`
  }

  projects(): AsyncGenerator<Project, void, undefined> {
    const organizationSlug = this.organizationSlug
    return this.transceiver.paginateGet(`${this.path}projects/`, {
      parse: (data) => Project.parse(this.sentry, data, organizationSlug),
    })
  }

  /** Create a project owned by this team */
  createProject(project: ProjectCreate): Promise<Project> {
    const organizationSlug = this.organizationSlug
    return this.transceiver.post(`${this.path}projects/`, project, {
      parse: (data) => Project.parse(this.sentry, data, organizationSlug),
    })
  }

  async update(changes: TeamUpdate): Promise<this> {
    const updated = await this.transceiver.put(this.path, changes, {
      parse: (data) => changesSchema.parse(data),
    })
    this.merge(updated, (data) => teamSchema.parse(data))
    return this
  }

  delete(): Promise<void> {
    return this.transceiver.delete(this.path)
  }
}
