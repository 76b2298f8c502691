import type { InstructionContext, InstructionResult } from '@intcode/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * ADD instruction (opcode 1)
 * memory[c] = a + b
 */
export class AddInstruction extends BaseInstruction<'add'> {
  readonly opcode = OPCODES.ADD
  readonly kind = 'add'
  readonly name = 'ADD'

  execute(context: InstructionContext<'add'>): InstructionResult {
    const [a, b, target] = context.instruction.parameters
    const result = this.load(context, a) + this.load(context, b)

    context.log('ADD: storing sum', { target: target.value, result })

    this.store(context, target, result)
    this.advance(context)
    return { resultCode: null }
  }
}

/**
 * MULTIPLY instruction (opcode 2)
 * memory[c] = a * b, exact for arbitrarily large products
 */
export class MultiplyInstruction extends BaseInstruction<'multiply'> {
  readonly opcode = OPCODES.MULTIPLY
  readonly kind = 'multiply'
  readonly name = 'MUL'

  execute(context: InstructionContext<'multiply'>): InstructionResult {
    const [a, b, target] = context.instruction.parameters
    const result = this.load(context, a) * this.load(context, b)

    context.log('MUL: storing product', { target: target.value, result })

    this.store(context, target, result)
    this.advance(context)
    return { resultCode: null }
  }
}
