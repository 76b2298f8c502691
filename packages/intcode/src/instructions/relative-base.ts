import type { InstructionContext, InstructionResult } from '@intcode/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * ADJUST_RELATIVE_BASE instruction (opcode 9)
 * relativeBase += a
 */
export class AdjustRelativeBaseInstruction extends BaseInstruction<'adjustRelativeBase'> {
  readonly opcode = OPCODES.ADJUST_RELATIVE_BASE
  readonly kind = 'adjustRelativeBase'
  readonly name = 'ARB'

  execute(context: InstructionContext<'adjustRelativeBase'>): InstructionResult {
    const [offset] = context.instruction.parameters
    const delta = this.load(context, offset)
    context.relativeBase += delta

    context.log('ARB: relative base adjusted', {
      delta,
      relativeBase: context.relativeBase,
    })

    this.advance(context)
    return { resultCode: null }
  }
}
