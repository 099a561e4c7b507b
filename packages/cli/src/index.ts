#!/usr/bin/env node
/**
 * issuesync CLI
 *
 * Entry point for the issuesync command.
 * Dispatches to sub-commands based on first argument.
 */

const command = process.argv[2]

function printHelp(): void {
  console.log(`
issuesync - Cached, incremental issue tracker sync

Usage:
  issuesync <command> [options]

Commands:
  sync            Fetch issues into the local cache (delta when possible)
  status          Show the state of the current or last sync task
  cancel          Cancel the running sync task
  help            Show this help message

Run 'issuesync <command> --help' for command-specific options.
`)
}

switch (command) {
  case 'sync':
    await import('./sync.js')
    break
  case 'status':
    await import('./status.js')
    break
  case 'cancel':
    await import('./cancel.js')
    break
  case 'help':
  case '--help':
  case '-h':
  case undefined:
    printHelp()
    break
  default:
    console.error(`Unknown command: ${command}`)
    printHelp()
    process.exit(1)
}
