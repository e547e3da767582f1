/**
 * Event Commands
 */

import { collect } from '../../sentry.js'
import type { CommandContext } from '../context.js'
import { printJson, printTable } from '../utils/output.js'

export interface ListEventsOptions {
  limit: number
}

export async function listEventsCommand(
  context: CommandContext,
  org: string,
  issueId: string,
  options: ListEventsOptions
): Promise<void> {
  const issue = await context.sentry.issue(org, issueId)
  const events = await collect(issue.events(), options.limit)

  if (context.json) {
    printJson(events)
    return
  }

  printTable(
    ['EVENT', 'DATE', 'ENVIRONMENT', 'TITLE'],
    events.map((event) => [
      event.eventId ?? event.id,
      event.json.dateCreated ?? '',
      event.tags['environment'] ?? '',
      event.title ?? event.message ?? '',
    ])
  )
}
