#!/usr/bin/env node
/**
 * sentry-rest CLI
 *
 * Query and manage Sentry organizations, projects and issues from the terminal
 */

import { run } from './program.js'

await run()
