/**
 * Intcode Error Taxonomy
 *
 * Every fault raised by the interpreter is an IntcodeError carrying one of
 * the codes below.
 */

import type { Word } from './intcode'

export const INTCODE_ERRORS = {
  INVALID_PROGRAM: 'invalid_program',
  INVALID_OPCODE: 'invalid_opcode',
  INVALID_MODE: 'invalid_mode',
  INVALID_ADDRESS: 'invalid_address',
  IMMEDIATE_STORE: 'immediate_store',
  PROTOCOL_MISUSE: 'protocol_misuse',
  STEP_LIMIT: 'step_limit',
} as const

export type IntcodeErrorCode =
  (typeof INTCODE_ERRORS)[keyof typeof INTCODE_ERRORS]

export class IntcodeError extends Error {
  constructor(
    message: string,
    public code: IntcodeErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'IntcodeError'
  }
}

// Load-time fault: malformed program text
export class ProgramParseError extends IntcodeError {
  constructor(
    message: string,
    public token: string,
    public index: number,
  ) {
    super(message, INTCODE_ERRORS.INVALID_PROGRAM, { token, index })
    this.name = 'ProgramParseError'
  }
}

// Unknown opcode or addressing-mode digit
export class DecodeError extends IntcodeError {
  constructor(
    message: string,
    code: typeof INTCODE_ERRORS.INVALID_OPCODE | typeof INTCODE_ERRORS.INVALID_MODE,
    public pc: number,
    public raw: Word,
  ) {
    super(message, code, { pc, raw })
    this.name = 'DecodeError'
  }
}

export class AddressError extends IntcodeError {
  constructor(
    message: string,
    public address: Word,
  ) {
    super(message, INTCODE_ERRORS.INVALID_ADDRESS, { address })
    this.name = 'AddressError'
  }
}

export class ImmediateStoreError extends IntcodeError {
  constructor(public value: Word) {
    super('cannot store to immediate parameter', INTCODE_ERRORS.IMMEDIATE_STORE, {
      value,
    })
    this.name = 'ImmediateStoreError'
  }
}

// Host programming error: misuse of the step/output protocol
export class ProtocolError extends IntcodeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, INTCODE_ERRORS.PROTOCOL_MISUSE, context)
    this.name = 'ProtocolError'
  }
}

export class StepLimitError extends IntcodeError {
  constructor(
    public limit: number,
    public pc: number,
  ) {
    super(`step limit of ${limit} reached at pc=${pc}`, INTCODE_ERRORS.STEP_LIMIT, {
      limit,
      pc,
    })
    this.name = 'StepLimitError'
  }
}
