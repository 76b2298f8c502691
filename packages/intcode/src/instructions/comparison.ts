import type { InstructionContext, InstructionResult } from '@intcode/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * LESS_THAN instruction (opcode 7)
 * memory[c] = a < b ? 1 : 0
 */
export class LessThanInstruction extends BaseInstruction<'lessThan'> {
  readonly opcode = OPCODES.LESS_THAN
  readonly kind = 'lessThan'
  readonly name = 'LT'

  execute(context: InstructionContext<'lessThan'>): InstructionResult {
    const [a, b, target] = context.instruction.parameters
    const result = this.load(context, a) < this.load(context, b) ? 1n : 0n

    context.log('LT: storing comparison', { target: target.value, result })

    this.store(context, target, result)
    this.advance(context)
    return { resultCode: null }
  }
}

/**
 * EQUALS instruction (opcode 8)
 * memory[c] = a == b ? 1 : 0
 */
export class EqualsInstruction extends BaseInstruction<'equals'> {
  readonly opcode = OPCODES.EQUALS
  readonly kind = 'equals'
  readonly name = 'EQ'

  execute(context: InstructionContext<'equals'>): InstructionResult {
    const [a, b, target] = context.instruction.parameters
    const result = this.load(context, a) === this.load(context, b) ? 1n : 0n

    context.log('EQ: storing comparison', { target: target.value, result })

    this.store(context, target, result)
    this.advance(context)
    return { resultCode: null }
  }
}
