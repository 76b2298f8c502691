/**
 * Base Intcode Instruction System
 *
 * Defines the handler interface and the abstract class all instruction
 * handlers extend.
 */

import type {
  Instruction,
  InstructionContext,
  InstructionKind,
  InstructionResult,
  Parameter,
  Word,
} from '@intcode/types'
import { AddressError } from '@intcode/types'
import { INSTRUCTION_LENGTHS } from '../config'
import { loadParameter, storeParameter } from '../operands'

/**
 * Base interface for all Intcode instruction handlers
 */
export interface InstructionHandler<K extends InstructionKind = InstructionKind> {
  readonly opcode: number
  readonly kind: K
  readonly name: string
  readonly length: number

  /**
   * Execute the instruction (mutates context in place)
   * @returns resultCode (null = continue, otherwise a suspension or finish)
   */
  execute(context: InstructionContext<K>): InstructionResult

  /**
   * Disassemble instruction to string representation
   */
  disassemble(instruction: Instruction<K>): string
}

export abstract class BaseInstruction<K extends InstructionKind>
  implements InstructionHandler<K>
{
  abstract readonly opcode: number
  abstract readonly kind: K
  abstract readonly name: string

  get length(): number {
    return INSTRUCTION_LENGTHS[this.kind]
  }

  abstract execute(context: InstructionContext<K>): InstructionResult

  protected load(context: InstructionContext<K>, parameter: Parameter): Word {
    return loadParameter(context.memory, context.relativeBase, parameter)
  }

  protected store(
    context: InstructionContext<K>,
    parameter: Parameter,
    value: Word,
  ): void {
    storeParameter(context.memory, context.relativeBase, parameter, value)
  }

  protected advance(context: InstructionContext<K>): void {
    context.pc += this.length
  }

  /**
   * Overwrite pc with a jump target
   * Targets must be representable as a non-negative safe integer.
   */
  protected jumpTo(context: InstructionContext<K>, target: Word): void {
    if (target < 0n || target > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new AddressError(
        `invalid jump target ${target} at pc=${context.pc}`,
        target,
      )
    }
    context.pc = Number(target)
  }

  disassemble(instruction: Instruction<K>): string {
    const parameters: readonly Parameter[] = instruction.parameters
    if (parameters.length === 0) {
      return this.name
    }
    return `${this.name} ${parameters.map(formatParameter).join(', ')}`
  }
}

export function formatParameter(parameter: Parameter): string {
  switch (parameter.mode) {
    case 'position':
      return `[${parameter.value}]`
    case 'immediate':
      return `${parameter.value}`
    case 'relative':
      return parameter.value < 0n
        ? `[rb-${-parameter.value}]`
        : `[rb+${parameter.value}]`
  }
}
