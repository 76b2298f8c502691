import { INTCODE_ERRORS, ProgramParseError } from '@intcode/types'
import { describe, expect, it } from 'vitest'
import { parseProgram } from '../parser'

describe('parseProgram', () => {
  it('parses comma-separated integers with surrounding whitespace', () => {
    const [error, program] = parseProgram(' 1, 2 ,-3\n')

    expect(error).toBeUndefined()
    expect(program).toEqual([1n, 2n, -3n])
  })

  it('keeps integers beyond the 64-bit range exact', () => {
    const [, program] = parseProgram('123456789012345678901234567890,99')

    expect(program).toEqual([123456789012345678901234567890n, 99n])
  })

  it('names the offending token and its index', () => {
    const [error] = parseProgram('1,x,3')

    expect(error).toBeInstanceOf(ProgramParseError)
    expect(error?.message).toBe('invalid program token "x" at index 1')
    expect(error?.token).toBe('x')
    expect(error?.index).toBe(1)
    expect(error?.code).toBe(INTCODE_ERRORS.INVALID_PROGRAM)
  })

  it('rejects empty tokens', () => {
    const [error] = parseProgram('1,,2')

    expect(error?.token).toBe('')
    expect(error?.index).toBe(1)
  })

  it('rejects non-integer tokens', () => {
    expect(parseProgram('1.5')[0]?.token).toBe('1.5')
    expect(parseProgram('+1')[0]?.token).toBe('+1')
  })

  it('rejects an empty program', () => {
    const [error] = parseProgram('  \n')

    expect(error?.message).toBe('program text is empty')
  })
})
