#!/usr/bin/env node

// Load environment variables first, before any other imports
import '../env.js'

import { isConfigError } from '../config/errors.js'
import { loadSettings } from '../config/settings.js'
import { runUntilSignal } from '../runtime.js'
import { runCheckCommand } from './commands/check.js'
import { parseCliArgs } from './parse-flags.js'

function printHelp(): void {
  console.log('P2000 monitor CLI')
  console.log('')
  console.log('Commands:')
  console.log('  check --region <path> [--name "<instance name>"] [--filters Ambulance,Fire,Police,Other]')
  console.log('  run')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const args = parseCliArgs(rest)
  if (args.help) {
    printHelp()
    process.exit(0)
  }

  if (args.unknown.length > 0) {
    console.error(`Unknown option: --${args.unknown.join(', --')}`)
    printHelp()
    process.exit(2)
  }

  switch (command) {
    case 'check':
      process.exit(
        await runCheckCommand({
          region: args.region,
          name: args.name,
          filters: args.filters,
        })
      )
    case 'run':
      // Runs until SIGINT/SIGTERM
      runUntilSignal(loadSettings())
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      process.exit(2)
  }
}

main().catch((error: unknown) => {
  if (isConfigError(error)) {
    console.error(error.message)
    process.exit(2)
  }
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
