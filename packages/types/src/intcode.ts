// Intcode Virtual Machine Types

// Machine word: arbitrary precision, so products never wrap
export type Word = bigint
export type WordLike = bigint | number

export type AddressingMode = 'position' | 'immediate' | 'relative'

export interface Parameter {
  mode: AddressingMode
  value: Word // raw operand, resolved at use time
}

// Operand tuple carried by each instruction kind
export interface ParameterMap {
  add: [Parameter, Parameter, Parameter]
  multiply: [Parameter, Parameter, Parameter]
  input: [Parameter]
  output: [Parameter]
  jumpIfTrue: [Parameter, Parameter]
  jumpIfFalse: [Parameter, Parameter]
  lessThan: [Parameter, Parameter, Parameter]
  equals: [Parameter, Parameter, Parameter]
  adjustRelativeBase: [Parameter]
  halt: []
}

export type InstructionKind = keyof ParameterMap

/**
 * Decoded instruction: a closed union over the ten instruction kinds.
 * `Instruction<'add'>` narrows to a single member.
 */
export type Instruction<K extends InstructionKind = InstructionKind> = {
  [P in K]: {
    kind: P
    opcode: number
    raw: Word // the instruction cell, including mode digits
    pc: number
    parameters: ParameterMap[P]
  }
}[K]

// Step outcomes
export const STEP_STATES = {
  RUNNING: 'running',
  BLOCKED_ON_INPUT: 'blocked-on-input',
  BLOCKED_ON_OUTPUT: 'blocked-on-output',
  FINISHED: 'finished',
} as const

export type StepState = (typeof STEP_STATES)[keyof typeof STEP_STATES]

// Outcome of run(): never "running"
export type RunState = Exclude<StepState, typeof STEP_STATES.RUNNING>

// Word-addressed memory, zero beyond its extent
export interface Memory {
  readonly size: number
  read(address: Word): Word
  write(address: Word, value: Word): void
  snapshot(): Word[]
  clone(): Memory
}

/**
 * Mutable view of the machine handed to an instruction handler.
 * Handlers move `pc` themselves; the machine commits the context afterwards.
 */
export interface InstructionContext<K extends InstructionKind = InstructionKind> {
  instruction: Instruction<K>
  memory: Memory
  pc: number
  relativeBase: Word
  input: Word[] // FIFO, shared with the machine
  output: Word | null
  log: (message: string, data?: Record<string, unknown>) => void
}

export interface InstructionResult {
  resultCode: RunState | null // null = continue execution
}

export interface MachineOptions {
  maxSteps?: number | null // executed-instruction ceiling, null = unlimited
  maxMemory?: number // cell count a write may not reach
  trace?: boolean
}

export interface MachineSnapshot {
  pc: number
  relativeBase: Word
  memory: Word[]
  input: Word[]
  output: Word | null
  finished: boolean
  steps: number
}

export interface ExecutionLogEntry {
  step: number
  pc: number
  relativeBase: Word
  instruction: string
}

export interface DisassembledLine {
  address: number
  words: Word[]
  text: string
}
