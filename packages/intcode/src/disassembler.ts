/**
 * Intcode Disassembler
 *
 * Linear sweep from address 0. Cells that do not decode are emitted as data.
 */

import type { DisassembledLine, WordLike } from '@intcode/types'
import { tryDecodeInstruction } from './decoder'
import { InstructionRegistry } from './instructions/registry'
import { toWord } from './machine'
import { IntcodeMemory } from './memory'

export function disassemble(program: readonly WordLike[]): DisassembledLine[] {
  const words = program.map(toWord)
  const memory = new IntcodeMemory(words)
  const registry = InstructionRegistry.getInstance()
  const lines: DisassembledLine[] = []

  let address = 0
  while (address < words.length) {
    const [error, instruction] = tryDecodeInstruction(memory, address)
    if (error) {
      lines.push({ address, words: [error.raw], text: `DATA ${error.raw}` })
      address += 1
      continue
    }

    const length = Math.max(registry.getHandler(instruction.kind).length, 1)
    lines.push({
      address,
      words: words.slice(address, address + length),
      text: registry.disassemble(instruction),
    })
    address += length
  }

  return lines
}

export function formatDisassembly(lines: readonly DisassembledLine[]): string {
  return lines
    .map((line) => `${String(line.address).padStart(4, '0')}: ${line.text}`)
    .join('\n')
}
