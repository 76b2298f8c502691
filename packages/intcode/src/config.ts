/**
 * Intcode Configuration Constants
 *
 * Opcodes, addressing-mode digits, instruction lengths and the default
 * sanity ceilings of the interpreter
 */

import type { AddressingMode, InstructionKind } from '@intcode/types'

// Opcode definitions (low two decimal digits of the instruction cell)
export const OPCODES = {
  ADD: 1,
  MULTIPLY: 2,
  INPUT: 3,
  OUTPUT: 4,
  JUMP_IF_TRUE: 5,
  JUMP_IF_FALSE: 6,
  LESS_THAN: 7,
  EQUALS: 8,
  ADJUST_RELATIVE_BASE: 9,
  HALT: 99,
} as const

// Addressing-mode digits, read from the hundreds place upwards
export const MODE_DIGITS: Readonly<Record<number, AddressingMode>> = {
  0: 'position',
  1: 'immediate',
  2: 'relative',
}

// pc advance per instruction kind; halt never advances
export const INSTRUCTION_LENGTHS: Readonly<Record<InstructionKind, number>> = {
  add: 4,
  multiply: 4,
  input: 2,
  output: 2,
  jumpIfTrue: 3,
  jumpIfFalse: 3,
  lessThan: 4,
  equals: 4,
  adjustRelativeBase: 2,
  halt: 0,
}

export const MEMORY_CONFIG = {
  MAX_SIZE: 1_048_576, // cells; a write at or beyond this address faults
} as const

export const MACHINE_DEFAULTS = {
  MAX_STEPS: null, // unlimited
  TRACE: false,
  MAX_EXECUTION_LOGS: 10_000, // most recent trace entries kept
} as const

// Output values treated as text by readText()
export const ASCII_RANGE = {
  MIN: 0n,
  MAX: 127n,
} as const
