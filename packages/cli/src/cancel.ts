#!/usr/bin/env node
/**
 * issuesync cancel
 *
 * Requests cancellation of the running sync. The sync stops before its
 * next request and keeps the records fetched so far.
 *
 * Usage:
 *   issuesync cancel [--config <file> | --state-dir <dir>]
 */

import path from 'path'
import { config } from 'dotenv'

config({ path: path.resolve(process.cwd(), '.env.local') })

import { booleanFlag, parseCliArgs, stringFlag } from './lib/args.js'
import { runCancel } from './lib/status-runner.js'

function printHelp(): void {
  console.log(`
issuesync cancel - Cancel the running sync

Usage:
  issuesync cancel [options]

Options:
  --config <file>     Take the state directory from a sync config
  --state-dir <dir>   State directory (default: .issuesync)
  --help, -h          Show this help message
`)
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(3), ['help'])
  if (booleanFlag(args, 'help')) {
    printHelp()
    return
  }

  const configPath = stringFlag(args, 'config')
  const stateDir = stringFlag(args, 'state-dir')
  const cancelled = await runCancel({
    ...(configPath ? { configPath } : {}),
    ...(stateDir ? { stateDir } : {}),
  })

  if (!cancelled) {
    console.log('No sync task is running.')
    process.exit(1)
  }
  console.log('Cancellation requested.')
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
