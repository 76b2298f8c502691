import { DecodeError, INTCODE_ERRORS } from '@intcode/types'
import { describe, expect, it } from 'vitest'
import {
  decodeInstruction,
  decodeMode,
  decodeOpcode,
  tryDecodeInstruction,
} from '../decoder'
import { IntcodeMemory } from '../memory'

describe('decodeOpcode', () => {
  it('takes the low two digits', () => {
    expect(decodeOpcode(1002n)).toBe(2)
    expect(decodeOpcode(99n)).toBe(99)
    expect(decodeOpcode(21107n)).toBe(7)
  })
})

describe('decodeMode', () => {
  it('reads modes from the hundreds digit upwards', () => {
    expect(decodeMode(1002n, 0, 0)).toBe('position')
    expect(decodeMode(1002n, 1, 0)).toBe('immediate')
    expect(decodeMode(1002n, 2, 0)).toBe('position')
    expect(decodeMode(21107n, 0, 0)).toBe('immediate')
    expect(decodeMode(21107n, 2, 0)).toBe('relative')
  })

  it('rejects unknown mode digits', () => {
    expect(() => decodeMode(301n, 0, 6)).toThrow(
      'invalid addressing mode 3 for parameter 1 at pc=6',
    )
  })
})

describe('decodeInstruction', () => {
  it('decodes opcode, modes and raw operands', () => {
    const memory = new IntcodeMemory([1002n, 4n, 3n, 4n, 33n])

    expect(decodeInstruction(memory, 0)).toEqual({
      kind: 'multiply',
      opcode: 2,
      raw: 1002n,
      pc: 0,
      parameters: [
        { mode: 'position', value: 4n },
        { mode: 'immediate', value: 3n },
        { mode: 'position', value: 4n },
      ],
    })
  })

  it('decodes relative parameters with negative offsets', () => {
    const memory = new IntcodeMemory([203n, -1n])

    expect(decodeInstruction(memory, 0)).toEqual({
      kind: 'input',
      opcode: 3,
      raw: 203n,
      pc: 0,
      parameters: [{ mode: 'relative', value: -1n }],
    })
  })

  it('ignores mode digits beyond the arity', () => {
    const memory = new IntcodeMemory([30104n, 5n, 10099n])

    expect(decodeInstruction(memory, 0).parameters).toEqual([
      { mode: 'immediate', value: 5n },
    ])
    expect(decodeInstruction(memory, 2).kind).toBe('halt')
  })

  it('reads operands past the end of memory as zero', () => {
    const memory = new IntcodeMemory([1n])

    expect(decodeInstruction(memory, 0).parameters).toEqual([
      { mode: 'position', value: 0n },
      { mode: 'position', value: 0n },
      { mode: 'position', value: 0n },
    ])
  })

  it('rejects unknown opcodes with pc and raw value', () => {
    const memory = new IntcodeMemory([98n, 0n, 0n])

    try {
      decodeInstruction(memory, 0)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError)
      if (error instanceof DecodeError) {
        expect(error.message).toBe('invalid opcode at pc=0: 98')
        expect(error.code).toBe(INTCODE_ERRORS.INVALID_OPCODE)
        expect(error.pc).toBe(0)
        expect(error.raw).toBe(98n)
      }
    }
  })

  it('rejects negative instruction cells', () => {
    const memory = new IntcodeMemory([-1n])

    expect(() => decodeInstruction(memory, 0)).toThrow('invalid opcode at pc=0: -1')
  })

  it('rejects a bad mode digit with the mode error code', () => {
    const memory = new IntcodeMemory([301n, 0n, 0n, 0n, 99n])
    const [error] = tryDecodeInstruction(memory, 0)

    expect(error?.code).toBe(INTCODE_ERRORS.INVALID_MODE)
  })

  it('decodes an empty cell beyond the program as an invalid opcode', () => {
    const memory = new IntcodeMemory([99n])

    expect(() => decodeInstruction(memory, 10)).toThrow('invalid opcode at pc=10: 0')
  })
})
