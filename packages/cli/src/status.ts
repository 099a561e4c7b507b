#!/usr/bin/env node
/**
 * issuesync status
 *
 * Prints the persisted state of the current (or last) sync task.
 *
 * Usage:
 *   issuesync status [--config <file> | --state-dir <dir>] [--json]
 */

import path from 'path'
import { config } from 'dotenv'

config({ path: path.resolve(process.cwd(), '.env.local') })

import { booleanFlag, parseCliArgs, stringFlag } from './lib/args.js'
import { formatTaskState, runStatus } from './lib/status-runner.js'

function printHelp(): void {
  console.log(`
issuesync status - Show the sync task state

Usage:
  issuesync status [options]

Options:
  --config <file>     Take the state directory from a sync config
  --state-dir <dir>   State directory (default: .issuesync)
  --json              Print the raw state document
  --help, -h          Show this help message
`)
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(3), ['json', 'help'])
  if (booleanFlag(args, 'help')) {
    printHelp()
    return
  }

  const configPath = stringFlag(args, 'config')
  const stateDir = stringFlag(args, 'state-dir')
  const state = await runStatus({
    ...(configPath ? { configPath } : {}),
    ...(stateDir ? { stateDir } : {}),
  })
  console.log(booleanFlag(args, 'json') ? JSON.stringify(state, null, 2) : formatTaskState(state))
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
