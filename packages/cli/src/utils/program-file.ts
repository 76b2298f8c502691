import { existsSync, readFileSync } from 'node:fs'
import type { Safe, Word } from '@intcode/types'
import { safeError } from '@intcode/types'
import { parseProgram } from '@intcode/vm'

/**
 * Read and parse a comma-separated program file
 */
export function readProgramFile(path: string): Safe<Word[], Error> {
  if (!existsSync(path)) {
    return safeError(new Error(`Program file not found: ${path}`))
  }
  return parseProgram(readFileSync(path, 'utf-8'))
}
