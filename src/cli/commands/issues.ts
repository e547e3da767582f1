/**
 * Issue Commands
 */

import chalk from 'chalk'
import { InvalidArgumentError } from '../../client/errors.js'
import { issueStatusSchema } from '../../models/schemas.js'
import { collect } from '../../sentry.js'
import type { CommandContext } from '../context.js'
import { printJson, printTable, statusColor } from '../utils/output.js'

export interface ListIssuesOptions {
  query?: string
  period?: string
  limit?: number
}

export interface UpdateIssuesOptions {
  id: string[]
  status: string
}

export async function listIssuesCommand(
  context: CommandContext,
  org: string,
  projectSlug: string,
  options: ListIssuesOptions
): Promise<void> {
  const project = await context.sentry.project(org, projectSlug)
  const issues = await collect(project.issues({ query: options.query, statsPeriod: options.period }), options.limit)

  if (context.json) {
    printJson(issues)
    return
  }

  printTable(
    ['ID', 'SHORT ID', 'STATUS', 'EVENTS', 'TITLE'],
    issues.map((issue) => [
      issue.id,
      issue.shortId ?? '',
      issue.status,
      String(issue.json.count ?? ''),
      issue.title,
    ])
  )
}

export async function updateIssuesCommand(
  context: CommandContext,
  org: string,
  projectSlug: string,
  options: UpdateIssuesOptions
): Promise<void> {
  const status = issueStatusSchema.safeParse(options.status)
  if (!status.success) {
    throw new InvalidArgumentError(
      `Unknown status '${options.status}', expected one of: ${issueStatusSchema.options.join(', ')}`
    )
  }

  const project = await context.sentry.project(org, projectSlug)
  const changes = await project.updateIssues(options.id, { status: status.data })

  if (context.json) {
    printJson(changes)
    return
  }

  const noun = options.id.length === 1 ? 'issue' : 'issues'
  console.log(chalk.green(`Updated ${options.id.length} ${noun}: ${statusColor(status.data)}`))
}
