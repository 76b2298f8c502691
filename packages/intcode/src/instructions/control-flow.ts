/**
 * Control Flow Instructions
 *
 * JUMP_IF_TRUE, JUMP_IF_FALSE and HALT
 */

import type { InstructionContext, InstructionResult } from '@intcode/types'
import { STEP_STATES } from '@intcode/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * JUMP_IF_TRUE instruction (opcode 5)
 * pc = b if a != 0, else pc += 3
 */
export class JumpIfTrueInstruction extends BaseInstruction<'jumpIfTrue'> {
  readonly opcode = OPCODES.JUMP_IF_TRUE
  readonly kind = 'jumpIfTrue'
  readonly name = 'JT'

  execute(context: InstructionContext<'jumpIfTrue'>): InstructionResult {
    const [condition, destination] = context.instruction.parameters

    if (this.load(context, condition) !== 0n) {
      const target = this.load(context, destination)
      context.log('JT: jump taken', { target })
      this.jumpTo(context, target)
    } else {
      this.advance(context)
    }
    return { resultCode: null }
  }
}

/**
 * JUMP_IF_FALSE instruction (opcode 6)
 * pc = b if a == 0, else pc += 3
 */
export class JumpIfFalseInstruction extends BaseInstruction<'jumpIfFalse'> {
  readonly opcode = OPCODES.JUMP_IF_FALSE
  readonly kind = 'jumpIfFalse'
  readonly name = 'JF'

  execute(context: InstructionContext<'jumpIfFalse'>): InstructionResult {
    const [condition, destination] = context.instruction.parameters

    if (this.load(context, condition) === 0n) {
      const target = this.load(context, destination)
      context.log('JF: jump taken', { target })
      this.jumpTo(context, target)
    } else {
      this.advance(context)
    }
    return { resultCode: null }
  }
}

/**
 * HALT instruction (opcode 99)
 * pc stays on the halt cell.
 */
export class HaltInstruction extends BaseInstruction<'halt'> {
  readonly opcode = OPCODES.HALT
  readonly kind = 'halt'
  readonly name = 'HALT'

  execute(context: InstructionContext<'halt'>): InstructionResult {
    context.log('HALT: program finished')
    return { resultCode: STEP_STATES.FINISHED }
  }
}
