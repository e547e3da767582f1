import { BaseModel } from './base.js'
import { integrationSchema } from './schemas.js'
import type { IntegrationRecord } from './schemas.js'
import { segment } from '../client/transceiver.js'
import type { Sentry } from '../sentry.js'

/**
 * An installed third-party integration (Slack, GitHub, Jira, ...) of one organization
 */
export class Integration extends BaseModel<IntegrationRecord> {
  readonly organizationSlug: string

  constructor(sentry: Sentry, json: IntegrationRecord, organizationSlug: string) {
    super(sentry, json)
    this.organizationSlug = organizationSlug
  }

  static parse(sentry: Sentry, data: unknown, organizationSlug: string): Integration {
    return new Integration(sentry, integrationSchema.parse(data), organizationSlug)
  }

  get id(): string {
    return this.json.id
  }

  get name(): string {
    return this.json.name
  }

  get provider(): { key: string; name: string } {
    return { key: this.json.provider.key, name: this.json.provider.name }
  }

  /** Uninstall the integration from the organization */
  delete(): Promise<void> {
    return this.transceiver.delete(
      `organizations/${segment(this.organizationSlug)}/integrations/${segment(this.id)}/`
    )
  }
}
