/**
 * Team Commands
 */

import chalk from 'chalk'
import { collect } from '../../sentry.js'
import type { CommandContext } from '../context.js'
import { printJson, printTable } from '../utils/output.js'

export interface CreateTeamOptions {
  name?: string
  slug?: string
}

export async function listTeamsCommand(context: CommandContext, org: string): Promise<void> {
  const organization = await context.sentry.organization(org)
  const teams = await collect(organization.teams())

  if (context.json) {
    printJson(teams)
    return
  }

  printTable(
    ['SLUG', 'NAME', 'MEMBERS'],
    teams.map((team) => [team.slug, team.name, String(team.json.memberCount ?? '')])
  )
}

export async function createTeamCommand(context: CommandContext, org: string, options: CreateTeamOptions): Promise<void> {
  const organization = await context.sentry.organization(org)
  const team = await organization.createTeam({ name: options.name, slug: options.slug })

  if (context.json) {
    printJson(team)
    return
  }

  console.log(chalk.green(`Created team ${team.slug} in ${org}`))
}

export async function deleteTeamCommand(context: CommandContext, org: string, slug: string): Promise<void> {
  const team = await context.sentry.team(org, slug)
  await team.delete()
  console.log(chalk.green(`Deleted team ${slug} from ${org}`))
}
