/**
 * Intcode Machine
 *
 * Cooperative suspend/resume interpreter. Each step decodes one instruction,
 * dispatches it through the instruction registry and commits the handler's
 * context back into the machine. Control returns to the host whenever the
 * program produces output, starves for input or halts.
 */

import { logger } from '@intcode/core'
import type {
  ExecutionLogEntry,
  InstructionContext,
  MachineOptions,
  MachineSnapshot,
  ProgramParseError,
  RunState,
  Safe,
  StepState,
  Word,
  WordLike,
} from '@intcode/types'
import {
  ProtocolError,
  STEP_STATES,
  StepLimitError,
  safeError,
  safeResult,
} from '@intcode/types'
import { ASCII_RANGE, MACHINE_DEFAULTS, MEMORY_CONFIG } from './config'
import { decodeInstruction } from './decoder'
import { InstructionRegistry } from './instructions/registry'
import { IntcodeMemory } from './memory'
import { parseProgram } from './parser'

interface ResolvedOptions {
  maxSteps: number | null
  maxMemory: number
  trace: boolean
}

export function toWord(value: WordLike): Word {
  if (typeof value === 'bigint') {
    return value
  }
  if (!Number.isSafeInteger(value)) {
    throw new ProtocolError(`not an integer word: ${value}`, { value })
  }
  return BigInt(value)
}

export class IntcodeMachine {
  private memory: IntcodeMemory
  private pc = 0
  private relativeBase: Word = 0n
  private input: Word[] = []
  private output: Word | null = null
  private finished = false
  private steps = 0
  private executionLogs: ExecutionLogEntry[] = []

  private readonly options: ResolvedOptions
  private readonly registry = InstructionRegistry.getInstance()

  constructor(program: readonly WordLike[], options: MachineOptions = {}) {
    this.options = {
      maxSteps: options.maxSteps ?? MACHINE_DEFAULTS.MAX_STEPS,
      maxMemory: options.maxMemory ?? MEMORY_CONFIG.MAX_SIZE,
      trace: options.trace ?? MACHINE_DEFAULTS.TRACE,
    }
    this.memory = new IntcodeMemory(program.map(toWord), this.options.maxMemory)
  }

  /**
   * Build a machine from program text
   * @throws ProgramParseError on malformed text
   */
  static parse(text: string, options: MachineOptions = {}): IntcodeMachine {
    const [error, program] = parseProgram(text)
    if (error) {
      throw error
    }
    return new IntcodeMachine(program, options)
  }

  static tryParse(
    text: string,
    options: MachineOptions = {},
  ): Safe<IntcodeMachine, ProgramParseError> {
    const [error, program] = parseProgram(text)
    if (error) {
      return safeError(error)
    }
    return safeResult(new IntcodeMachine(program, options))
  }

  get isFinished(): boolean {
    return this.finished
  }

  get stepCount(): number {
    return this.steps
  }

  get programCounter(): number {
    return this.pc
  }

  get pendingOutput(): Word | null {
    return this.output
  }

  get hasOutput(): boolean {
    return this.output !== null
  }

  /**
   * Execute at most one instruction
   */
  step(): StepState {
    if (this.finished) {
      throw new ProtocolError('cannot step a finished machine', { pc: this.pc })
    }
    if (this.output !== null) {
      return STEP_STATES.BLOCKED_ON_OUTPUT
    }
    if (this.options.maxSteps !== null && this.steps >= this.options.maxSteps) {
      throw new StepLimitError(this.options.maxSteps, this.pc)
    }

    const instruction = decodeInstruction(this.memory, this.pc)
    const context: InstructionContext = {
      instruction,
      memory: this.memory,
      pc: this.pc,
      relativeBase: this.relativeBase,
      input: this.input,
      output: this.output,
      log: (message, data) => {
        if (this.options.trace) {
          logger.debug(message, data)
        }
      },
    }

    const { resultCode } = this.registry.execute(context)
    if (resultCode === STEP_STATES.BLOCKED_ON_INPUT) {
      return resultCode
    }

    if (this.options.trace) {
      const entry: ExecutionLogEntry = {
        step: this.steps,
        pc: this.pc,
        relativeBase: this.relativeBase,
        instruction: this.registry.disassemble(instruction),
      }
      this.executionLogs.push(entry)
      const cap = MACHINE_DEFAULTS.MAX_EXECUTION_LOGS
      if (this.executionLogs.length >= 2 * cap) {
        this.executionLogs = this.executionLogs.slice(-cap)
      }
      logger.debug(`[${entry.step}] pc=${entry.pc}: ${entry.instruction}`)
    }

    this.pc = context.pc
    this.relativeBase = context.relativeBase
    this.output = context.output
    this.steps += 1

    if (resultCode === STEP_STATES.FINISHED) {
      this.finished = true
    }
    return resultCode ?? STEP_STATES.RUNNING
  }

  /**
   * Step until the machine suspends or finishes
   */
  run(): RunState {
    for (;;) {
      const state = this.step()
      if (state !== STEP_STATES.RUNNING) {
        return state
      }
    }
  }

  /**
   * Step at most `limit` times; `running` means the budget ran out
   */
  runSteps(limit: number): StepState {
    for (let i = 0; i < limit; i++) {
      const state = this.step()
      if (state !== STEP_STATES.RUNNING) {
        return state
      }
    }
    return STEP_STATES.RUNNING
  }

  appendInput(...values: WordLike[]): void {
    for (const value of values) {
      this.input.push(toWord(value))
    }
  }

  /**
   * Queue each code point of `text` as input
   */
  appendText(text: string): void {
    for (const char of text) {
      this.input.push(BigInt(char.codePointAt(0) ?? 0))
    }
  }

  takeOutput(): Word {
    const value = this.output
    if (value === null) {
      throw new ProtocolError('no output pending', { pc: this.pc })
    }
    this.output = null
    return value
  }

  /**
   * Run while outputs are ASCII, collecting them as text.
   * A non-ASCII output is left pending.
   */
  readText(): string | null {
    if (this.finished) {
      return null
    }

    let text = ''
    while (this.run() === STEP_STATES.BLOCKED_ON_OUTPUT) {
      const value = this.output
      if (value === null || value < ASCII_RANGE.MIN || value > ASCII_RANGE.MAX) {
        break
      }
      text += String.fromCharCode(Number(value))
      this.output = null
    }
    return text.length > 0 ? text : null
  }

  poke(address: WordLike, value: WordLike): void {
    this.memory.write(toWord(address), toWord(value))
  }

  peek(address: WordLike): Word {
    return this.memory.read(toWord(address))
  }

  /**
   * Independent deep copy; the two machines share no state afterwards
   */
  clone(): IntcodeMachine {
    const copy = new IntcodeMachine([], this.options)
    copy.memory = this.memory.clone()
    copy.pc = this.pc
    copy.relativeBase = this.relativeBase
    copy.input = [...this.input]
    copy.output = this.output
    copy.finished = this.finished
    copy.steps = this.steps
    copy.executionLogs = [...this.executionLogs]
    return copy
  }

  getState(): MachineSnapshot {
    return {
      pc: this.pc,
      relativeBase: this.relativeBase,
      memory: this.memory.snapshot(),
      input: [...this.input],
      output: this.output,
      finished: this.finished,
      steps: this.steps,
    }
  }

  /**
   * Trace entries, capped at the most recent MAX_EXECUTION_LOGS
   */
  getExecutionLogs(): ExecutionLogEntry[] {
    return this.executionLogs.slice(-MACHINE_DEFAULTS.MAX_EXECUTION_LOGS)
  }
}
