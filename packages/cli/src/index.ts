#!/usr/bin/env tsx

import { logger } from '@intcode/core'
import { Command } from 'commander'
import { config } from 'dotenv'
import { createDisasmCommand } from './commands/disasm'
import { createRunCommand } from './commands/run'

// Load environment variables
config()

// Initialize logger
logger.init()

const program = new Command('intcode')
  .description('Run and inspect Intcode programs')
  .version('0.1.0')
  .addCommand(createRunCommand())
  .addCommand(createDisasmCommand())

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed:', error)
  process.exit(1)
})
