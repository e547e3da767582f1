import { BaseModel } from './base.js'
import { Integration } from './integration.js'
import { Issue } from './issue.js'
import type { IssueListOptions } from './project.js'
import { Project } from './project.js'
import { organizationSchema } from './schemas.js'
import type { OrganizationRecord } from './schemas.js'
import { Team } from './team.js'
import { InvalidArgumentError } from '../client/errors.js'
import { segment } from '../client/transceiver.js'
import type { Sentry } from '../sentry.js'

export interface TeamCreate {
  name?: string
  slug?: string
}

export interface OrganizationIssueListOptions extends IssueListOptions {
  /** Restrict to these project ids */
  project?: ReadonlyArray<string | number>
  environment?: string
}

export interface IntegrationListOptions {
  /** Only integrations of this provider, e.g. `slack` */
  providerKey?: string
}

export class Organization extends BaseModel<OrganizationRecord> {
  static parse(sentry: Sentry, data: unknown): Organization {
    return new Organization(sentry, organizationSchema.parse(data))
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

  private get path(): string {
    return `organizations/${segment(this.slug)}/`
  }

  teams(): AsyncGenerator<Team, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}teams/`, {
      parse: (data) => Team.parse(this.sentry, data, this.slug),
    })
  }

  team(teamSlug: string): Promise<Team> {
    return this.sentry.team(this.slug, teamSlug)
  }

  /**
   * Create a team. The API fills in whichever of name and slug is missing.
   */
  async createTeam(team: TeamCreate): Promise<Team> {
    if (!team.name && !team.slug) {
      throw new InvalidArgumentError('A team needs a name or a slug')
    }
    return this.transceiver.post(`${this.path}teams/`, team, {
      parse: (data) => Team.parse(this.sentry, data, this.slug),
    })
  }

  projects(): AsyncGenerator<Project, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}projects/`, {
      parse: (data) => Project.parse(this.sentry, data, this.slug),
    })
  }

  project(projectSlug: string): Promise<Project> {
    return this.sentry.project(this.slug, projectSlug)
  }

  /** Issues across all projects of the organization */
  issues(options: OrganizationIssueListOptions = {}): AsyncGenerator<Issue, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}issues/`, {
      params: {
        query: options.query,
        statsPeriod: options.statsPeriod,
        project: options.project?.map(String),
        environment: options.environment,
      },
      parse: (data) => Issue.parse(this.sentry, data, this.slug),
    })
  }

  issue(issueId: string | number): Promise<Issue> {
    return this.sentry.issue(this.slug, issueId)
  }

  integrations(options: IntegrationListOptions = {}): AsyncGenerator<Integration, void, undefined> {
    return this.transceiver.paginateGet(`${this.path}integrations/`, {
      params: { provider_key: options.providerKey },
      parse: (data) => Integration.parse(this.sentry, data, this.slug),
    })
  }

  integration(integrationId: string | number): Promise<Integration> {
    return this.transceiver.get(`${this.path}integrations/${segment(integrationId)}/`, {
      parse: (data) => Integration.parse(this.sentry, data, this.slug),
    })
  }
}
