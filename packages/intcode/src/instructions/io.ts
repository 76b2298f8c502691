import type { InstructionContext, InstructionResult } from '@intcode/types'
import { STEP_STATES } from '@intcode/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * INPUT instruction (opcode 3)
 * Consumes the front of the input queue into memory[a].
 * Suspends without consuming anything when the queue is empty.
 */
export class InputInstruction extends BaseInstruction<'input'> {
  readonly opcode = OPCODES.INPUT
  readonly kind = 'input'
  readonly name = 'IN'

  execute(context: InstructionContext<'input'>): InstructionResult {
    const [target] = context.instruction.parameters
    const value = context.input[0]

    if (value === undefined) {
      context.log('IN: input queue empty, suspending')
      return { resultCode: STEP_STATES.BLOCKED_ON_INPUT }
    }

    this.store(context, target, value)
    context.input.shift()
    this.advance(context)
    return { resultCode: null }
  }
}

/**
 * OUTPUT instruction (opcode 4)
 * Buffers load(a) and always yields to the host.
 */
export class OutputInstruction extends BaseInstruction<'output'> {
  readonly opcode = OPCODES.OUTPUT
  readonly kind = 'output'
  readonly name = 'OUT'

  execute(context: InstructionContext<'output'>): InstructionResult {
    // at most one buffered output; retried once the host takes it
    if (context.output !== null) {
      return { resultCode: STEP_STATES.BLOCKED_ON_OUTPUT }
    }

    const [source] = context.instruction.parameters
    context.output = this.load(context, source)

    context.log('OUT: buffered output', { value: context.output })

    this.advance(context)
    return { resultCode: STEP_STATES.BLOCKED_ON_OUTPUT }
  }
}
