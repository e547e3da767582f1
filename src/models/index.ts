export { BaseModel } from './base.js'
export { Organization } from './organization.js'
export type { TeamCreate, OrganizationIssueListOptions, IntegrationListOptions } from './organization.js'
export { Team } from './team.js'
export type { TeamUpdate, ProjectCreate } from './team.js'
export { Project } from './project.js'
export type { IssueListOptions, EventCountOptions, ProjectUpdate } from './project.js'
export { Issue } from './issue.js'
export type { IssueUpdate, EventListOptions } from './issue.js'
export { Event } from './event.js'
export { Integration } from './integration.js'
export { EventResolution } from './event-count.js'
export type { EventCount, EventStat } from './event-count.js'
export * from './schemas.js'
