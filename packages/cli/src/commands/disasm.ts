import { logger } from '@intcode/core'
import { disassemble, formatDisassembly } from '@intcode/vm'
import { Command } from 'commander'
import { readProgramFile } from '../utils/program-file'

export function createDisasmCommand(): Command {
  const command = new Command('disasm')
    .description('Print the disassembly of an Intcode program')
    .argument('<file>', 'Comma-separated program file')
    .action((file: string) => {
      const [error, program] = readProgramFile(file)
      if (error) {
        logger.error('Failed to load program:', error)
        process.exit(1)
      }

      console.log(formatDisassembly(disassemble(program)))
    })

  return command
}
