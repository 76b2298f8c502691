/**
 * Intcode Instruction Decoder
 *
 * Splits an instruction cell into its opcode (low two digits) and per-parameter
 * addressing modes (hundreds, thousands, ten-thousands digits), then reads the
 * operand cells that follow it.
 */

import type {
  AddressingMode,
  Instruction,
  Memory,
  Parameter,
  Safe,
  Word,
} from '@intcode/types'
import {
  DecodeError,
  INTCODE_ERRORS,
  safeError,
  safeResult,
} from '@intcode/types'
import { MODE_DIGITS, OPCODES } from './config'

/**
 * Extract the opcode from an instruction cell
 */
export function decodeOpcode(raw: Word): number {
  return Number(raw % 100n)
}

/**
 * Addressing mode of the parameter at `index` (0-based)
 * Missing leading digits are position mode.
 */
export function decodeMode(raw: Word, index: number, pc: number): AddressingMode {
  const digit = Number((raw / 10n ** BigInt(index + 2)) % 10n)
  const mode = MODE_DIGITS[digit]
  if (mode === undefined) {
    throw new DecodeError(
      `invalid addressing mode ${digit} for parameter ${index + 1} at pc=${pc}`,
      INTCODE_ERRORS.INVALID_MODE,
      pc,
      raw,
    )
  }
  return mode
}

/**
 * Decode the instruction at `pc` without side effects
 */
export function decodeInstruction(memory: Memory, pc: number): Instruction {
  const raw = memory.read(BigInt(pc))
  if (raw < 0n) {
    throw invalidOpcode(raw, pc)
  }
  const opcode = decodeOpcode(raw)

  const param = (index: number): Parameter => ({
    mode: decodeMode(raw, index, pc),
    value: memory.read(BigInt(pc + 1 + index)),
  })

  switch (opcode) {
    case OPCODES.ADD:
      return { kind: 'add', opcode, raw, pc, parameters: [param(0), param(1), param(2)] }
    case OPCODES.MULTIPLY:
      return {
        kind: 'multiply',
        opcode,
        raw,
        pc,
        parameters: [param(0), param(1), param(2)],
      }
    case OPCODES.INPUT:
      return { kind: 'input', opcode, raw, pc, parameters: [param(0)] }
    case OPCODES.OUTPUT:
      return { kind: 'output', opcode, raw, pc, parameters: [param(0)] }
    case OPCODES.JUMP_IF_TRUE:
      return { kind: 'jumpIfTrue', opcode, raw, pc, parameters: [param(0), param(1)] }
    case OPCODES.JUMP_IF_FALSE:
      return { kind: 'jumpIfFalse', opcode, raw, pc, parameters: [param(0), param(1)] }
    case OPCODES.LESS_THAN:
      return {
        kind: 'lessThan',
        opcode,
        raw,
        pc,
        parameters: [param(0), param(1), param(2)],
      }
    case OPCODES.EQUALS:
      return {
        kind: 'equals',
        opcode,
        raw,
        pc,
        parameters: [param(0), param(1), param(2)],
      }
    case OPCODES.ADJUST_RELATIVE_BASE:
      return { kind: 'adjustRelativeBase', opcode, raw, pc, parameters: [param(0)] }
    case OPCODES.HALT:
      return { kind: 'halt', opcode, raw, pc, parameters: [] }
    default:
      throw invalidOpcode(raw, pc)
  }
}

/**
 * Decode variant that reports an undecodable cell as a value
 */
export function tryDecodeInstruction(
  memory: Memory,
  pc: number,
): Safe<Instruction, DecodeError> {
  try {
    return safeResult(decodeInstruction(memory, pc))
  } catch (error) {
    if (error instanceof DecodeError) {
      return safeError(error)
    }
    throw error
  }
}

function invalidOpcode(raw: Word, pc: number): DecodeError {
  return new DecodeError(
    `invalid opcode at pc=${pc}: ${raw}`,
    INTCODE_ERRORS.INVALID_OPCODE,
    pc,
    raw,
  )
}
