/**
 * Organization Commands
 */

import { collect } from '../../sentry.js'
import type { CommandContext } from '../context.js'
import { printJson, printTable } from '../utils/output.js'

export async function listOrganizationsCommand(context: CommandContext): Promise<void> {
  const organizations = await collect(context.sentry.organizations())

  if (context.json) {
    printJson(organizations)
    return
  }

  printTable(
    ['SLUG', 'NAME', 'ID'],
    organizations.map((organization) => [organization.slug, organization.name, organization.id])
  )
}

export async function showOrganizationCommand(context: CommandContext, slug: string): Promise<void> {
  const organization = await context.sentry.organization(slug)

  if (context.json) {
    printJson(organization)
    return
  }

  console.log(`${organization.name} (${organization.slug})`)
  console.log(`  ID: ${organization.id}`)
  if (organization.json.dateCreated) {
    console.log(`  Created: ${organization.json.dateCreated}`)
  }
}
