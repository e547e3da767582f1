/**
 * sentry-rest CLI program
 *
 * Command tree only; `index.ts` runs it against process.argv
 */

import chalk from 'chalk'
import { Command, InvalidArgumentError as InvalidOptionValue } from 'commander'
import { SentryApiError, toSentryError } from '../client/errors.js'
import { DEFAULT_BASE_URL } from '../client/transceiver.js'
import { createContext, requireOrganization } from './context.js'
import type { CommandContext, ContextSources, GlobalOptions } from './context.js'
import { listEventsCommand } from './commands/events.js'
import { listIssuesCommand, updateIssuesCommand } from './commands/issues.js'
import type { ListIssuesOptions, UpdateIssuesOptions } from './commands/issues.js'
import { loginCommand, logoutCommand } from './commands/login.js'
import type { LoginOptions } from './commands/login.js'
import { listOrganizationsCommand, showOrganizationCommand } from './commands/organizations.js'
import { listProjectsCommand } from './commands/projects.js'
import type { ListProjectsOptions } from './commands/projects.js'
import { createTeamCommand, deleteTeamCommand, listTeamsCommand } from './commands/teams.js'
import type { CreateTeamOptions } from './commands/teams.js'

export const VERSION = '0.1.0'

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidOptionValue('Must be a positive integer.')
  }
  return parsed
}

/**
 * Print an error the way every command reports failures
 */
export function reportError(error: unknown, verbose = false): void {
  const sentryError = toSentryError(error)
  const message = sentryError instanceof SentryApiError ? sentryError.detail : sentryError.message
  console.error(chalk.red(`Error: ${message}`))
  if (sentryError instanceof SentryApiError && sentryError.status === 401) {
    console.error('Check the token, or run: sentry-rest login --token <token>')
  }
  if (verbose && sentryError.stack) {
    console.error(chalk.dim(sentryError.stack))
  }
}

export function createProgram(sources: ContextSources = {}): Command {
  const program = new Command()

  program
    .name('sentry-rest')
    .description('Query and manage Sentry organizations, projects and issues')
    .version(VERSION)
    .option('--url <url>', 'Service URL (default: SENTRY_URL or https://sentry.io)')
    .option('--token <token>', 'Auth token (default: SENTRY_AUTH_TOKEN or saved login)')
    .option('--verbose', 'Log every request to stderr')
    .option('--json', 'Print raw JSON instead of tables')

  const withContext = async (command: Command, handler: (context: CommandContext) => Promise<void>) => {
    const context = await createContext(command.optsWithGlobals<GlobalOptions>(), sources)
    await handler(context)
  }

  // Auth
  program
    .command('login')
    .description('Verify a token and save it for this service URL')
    .option('--org <org>', 'Default organization for later commands')
    .action(async (options: LoginOptions, command: Command) => {
      await withContext(command, (context) => loginCommand(context, options, sources.authFile))
    })

  program
    .command('logout')
    .description('Forget the saved token for this service URL')
    .action(async (_options: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>()
      const env = sources.env ?? process.env
      await logoutCommand(globals.url || env.SENTRY_URL || DEFAULT_BASE_URL, sources.authFile)
    })

  // Organizations
  const orgs = program.command('orgs').description('Organizations')

  orgs
    .command('list')
    .description('List organizations the token can access')
    .action(async (_options: unknown, command: Command) => {
      await withContext(command, (context) => listOrganizationsCommand(context))
    })

  orgs
    .command('show')
    .description('Show one organization')
    .argument('[org]', 'Organization slug (default: SENTRY_ORG)')
    .action(async (org: string | undefined, _options: unknown, command: Command) => {
      await withContext(command, (context) => showOrganizationCommand(context, requireOrganization(context, org)))
    })

  // Projects
  program
    .command('projects')
    .description('Projects')
    .command('list')
    .description('List projects, across all organizations unless --org is given')
    .option('--org <org>', 'Only projects of this organization')
    .action(async (options: ListProjectsOptions, command: Command) => {
      await withContext(command, (context) => listProjectsCommand(context, options))
    })

  // Teams
  const teams = program.command('teams').description('Teams')

  teams
    .command('list')
    .argument('<org>', 'Organization slug')
    .description('List teams of an organization')
    .action(async (org: string, _options: unknown, command: Command) => {
      await withContext(command, (context) => listTeamsCommand(context, org))
    })

  teams
    .command('create')
    .argument('<org>', 'Organization slug')
    .description('Create a team')
    .option('--name <name>', 'Team name')
    .option('--slug <slug>', 'Team slug')
    .action(async (org: string, options: CreateTeamOptions, command: Command) => {
      await withContext(command, (context) => createTeamCommand(context, org, options))
    })

  teams
    .command('delete')
    .argument('<org>', 'Organization slug')
    .argument('<team>', 'Team slug')
    .description('Delete a team')
    .action(async (org: string, team: string, _options: unknown, command: Command) => {
      await withContext(command, (context) => deleteTeamCommand(context, org, team))
    })

  // Issues
  const issues = program.command('issues').description('Issues')

  issues
    .command('list')
    .argument('<org>', 'Organization slug')
    .argument('<project>', 'Project slug')
    .description('List issues of a project')
    .option('-q, --query <query>', 'Search query', 'is:unresolved')
    .option('--period <period>', 'Stats period, e.g. 24h or 14d')
    .option('--limit <n>', 'Stop after n issues', parsePositiveInt)
    .action(async (org: string, project: string, options: ListIssuesOptions, command: Command) => {
      await withContext(command, (context) => listIssuesCommand(context, org, project, options))
    })

  issues
    .command('update')
    .argument('<org>', 'Organization slug')
    .argument('<project>', 'Project slug')
    .description('Change the status of one or more issues')
    .requiredOption('--id <ids...>', 'Issue ids')
    .requiredOption('--status <status>', 'resolved, unresolved, ignored or resolvedInNextRelease')
    .action(async (org: string, project: string, options: UpdateIssuesOptions, command: Command) => {
      await withContext(command, (context) => updateIssuesCommand(context, org, project, options))
    })

  // Events
  program
    .command('events')
    .description('Events')
    .command('list')
    .argument('<org>', 'Organization slug')
    .argument('<issue>', 'Issue id')
    .description('List the most recent events of an issue')
    .option('--limit <n>', 'Stop after n events', parsePositiveInt, 25)
    .action(async (org: string, issue: string, options: { limit: number }, command: Command) => {
      await withContext(command, (context) => listEventsCommand(context, org, issue, options))
    })

  return program
}

/**
 * Parse arguments and run; failures are reported and turn into exit code 1
 */
export async function run(argv: string[] = process.argv, sources: ContextSources = {}): Promise<void> {
  const program = createProgram(sources)

  if (argv.length < 3) {
    program.outputHelp()
    return
  }

  try {
    await program.parseAsync(argv)
  } catch (error) {
    reportError(error, program.opts<GlobalOptions>().verbose)
    process.exitCode = 1
  }
}
