#!/usr/bin/env node
/**
 * issuesync sync
 *
 * Runs one sync and prints its outcome. Ctrl-C requests cooperative
 * cancellation; the records fetched so far are reported.
 *
 * Usage:
 *   issuesync sync --config <file> [options]
 *
 * Options:
 *   --config <file>     Sync config (YAML)
 *   --jql <query>       Override the configured query
 *   --full              Ignore the cache and fetch everything
 *   --changelog         Also load status histories of completed issues
 *   --quiet             Do not print progress while fetching
 *   --help, -h          Show this help message
 *
 * Environment (loaded from .env.local in CWD):
 *   Any variable referenced as ${NAME} in the config, e.g. TRACKER_TOKEN
 */

import path from 'path'
import { config } from 'dotenv'

// Load environment variables from .env.local in CWD
config({ path: path.resolve(process.cwd(), '.env.local') })

import type { TaskState } from '@issuesync/core'
import { formatError } from '@issuesync/tracker'
import { booleanFlag, parseCliArgs, stringFlag } from './lib/args.js'
import { formatTaskState } from './lib/status-runner.js'
import { runSync } from './lib/sync-runner.js'

function printHelp(): void {
  console.log(`
issuesync sync - Fetch issues into the local cache

Usage:
  issuesync sync --config <file> [options]

Options:
  --config <file>     Sync config (YAML)
  --jql <query>       Override the configured query
  --full              Ignore the cache and fetch everything
  --changelog         Also load status histories of completed issues
  --quiet             Do not print progress while fetching
  --help, -h          Show this help message

Examples:
  issuesync sync --config sync.yaml
  issuesync sync --config sync.yaml --jql "project = ABC AND status != Done" --full
`)
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(3), ['full', 'changelog', 'quiet', 'help'])
  if (booleanFlag(args, 'help')) {
    printHelp()
    return
  }

  const configPath = stringFlag(args, 'config')
  if (!configPath) {
    console.error('Error: --config <file> is required')
    printHelp()
    process.exit(1)
  }

  const controller = new AbortController()
  process.once('SIGINT', () => {
    console.log('\nCancellation requested, finishing the current request...')
    controller.abort()
  })

  const quiet = booleanFlag(args, 'quiet')
  const jql = stringFlag(args, 'jql')
  const outcome = await runSync({
    configPath,
    ...(jql ? { jql } : {}),
    full: booleanFlag(args, 'full'),
    ...(booleanFlag(args, 'changelog') ? { changelog: true } : {}),
    signal: controller.signal,
    ...(quiet ? {} : { onProgress: (state: TaskState) => console.log(`${formatTaskState(state)}\n`) }),
  })

  if (!outcome.started || !outcome.result) {
    console.error(`Sync not started: ${outcome.reason ?? 'unknown reason'}`)
    process.exit(1)
  }

  const { result } = outcome
  console.log(result.message ?? '')
  console.log(`  Source:  ${result.source}`)
  console.log(`  Issues:  ${result.issues.length}`)
  console.log(`  Changed: ${result.changedKeys.length}`)
  if (result.histories) {
    console.log(`  Changelogs: ${result.histories.length}`)
  }

  if (!result.success) {
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  if (process.env.LOG_LEVEL === 'debug') {
    console.error(JSON.stringify(formatError(error), null, 2))
  }
  process.exit(1)
})
