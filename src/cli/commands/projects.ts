/**
 * Project Commands
 */

import { collect } from '../../sentry.js'
import type { Project } from '../../models/project.js'
import type { CommandContext } from '../context.js'
import { printJson, printTable } from '../utils/output.js'

export interface ListProjectsOptions {
  org?: string
}

export async function listProjectsCommand(context: CommandContext, options: ListProjectsOptions): Promise<void> {
  let projects: Project[]
  if (options.org) {
    const organization = await context.sentry.organization(options.org)
    projects = await collect(organization.projects())
  } else {
    projects = await collect(context.sentry.projects())
  }

  if (context.json) {
    printJson(projects)
    return
  }

  printTable(
    ['ORGANIZATION', 'SLUG', 'NAME', 'PLATFORM'],
    projects.map((project) => [project.organizationSlug, project.slug, project.name, project.platform ?? ''])
  )
}
