/**
 * Instruction Registry
 *
 * Central registry of the Intcode instruction handlers.
 * Acts as the dispatcher for the machine and the disassembler.
 */

import type {
  Instruction,
  InstructionContext,
  InstructionKind,
  InstructionResult,
} from '@intcode/types'
import { AddInstruction, MultiplyInstruction } from './arithmetic'
import type { InstructionHandler } from './base'
import { EqualsInstruction, LessThanInstruction } from './comparison'
import {
  HaltInstruction,
  JumpIfFalseInstruction,
  JumpIfTrueInstruction,
} from './control-flow'
import { InputInstruction, OutputInstruction } from './io'
import { AdjustRelativeBaseInstruction } from './relative-base'

// One handler per instruction kind, typed to that kind
type HandlerTable = { [K in InstructionKind]: InstructionHandler<K> }

export class InstructionRegistry {
  private static instance: InstructionRegistry | null = null

  private readonly handlers: HandlerTable = {
    add: new AddInstruction(),
    multiply: new MultiplyInstruction(),
    input: new InputInstruction(),
    output: new OutputInstruction(),
    jumpIfTrue: new JumpIfTrueInstruction(),
    jumpIfFalse: new JumpIfFalseInstruction(),
    lessThan: new LessThanInstruction(),
    equals: new EqualsInstruction(),
    adjustRelativeBase: new AdjustRelativeBaseInstruction(),
    halt: new HaltInstruction(),
  }

  /**
   * Shared registry; handlers hold no state
   */
  static getInstance(): InstructionRegistry {
    if (InstructionRegistry.instance === null) {
      InstructionRegistry.instance = new InstructionRegistry()
    }
    return InstructionRegistry.instance
  }

  /**
   * Get instruction handler by kind
   */
  getHandler<K extends InstructionKind>(kind: K): InstructionHandler<K> {
    return this.handlers[kind]
  }

  /**
   * Get instruction handler by opcode
   */
  getHandlerByOpcode(opcode: number): InstructionHandler | undefined {
    return this.getAllHandlers().find((handler) => handler.opcode === opcode)
  }

  /**
   * Dispatch a decoded instruction to its handler
   */
  execute<K extends InstructionKind>(
    context: InstructionContext<K>,
  ): InstructionResult {
    const handler: InstructionHandler<K> = this.handlers[context.instruction.kind]
    return handler.execute(context)
  }

  disassemble<K extends InstructionKind>(instruction: Instruction<K>): string {
    const handler: InstructionHandler<K> = this.handlers[instruction.kind]
    return handler.disassemble(instruction)
  }

  /**
   * Get all registered opcodes
   */
  getRegisteredOpcodes(): number[] {
    return this.getAllHandlers().map((handler) => handler.opcode)
  }

  /**
   * Get all registered handlers
   */
  getAllHandlers(): InstructionHandler[] {
    return Object.values(this.handlers)
  }
}
