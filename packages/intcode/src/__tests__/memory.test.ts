import { AddressError } from '@intcode/types'
import { describe, expect, it } from 'vitest'
import { IntcodeMemory } from '../memory'

describe('IntcodeMemory', () => {
  it('reads zero beyond the extent without growing', () => {
    const memory = new IntcodeMemory([1n, 2n])

    expect(memory.read(1000n)).toBe(0n)
    expect(memory.size).toBe(2)
  })

  it('zero-fills when writing past the extent', () => {
    const memory = new IntcodeMemory([1n])
    memory.write(4n, 9n)

    expect(memory.size).toBe(5)
    expect(memory.snapshot()).toEqual([1n, 0n, 0n, 0n, 9n])
  })

  it('rejects negative addresses', () => {
    const memory = new IntcodeMemory([1n])

    expect(() => memory.read(-1n)).toThrow(AddressError)
    expect(() => memory.write(-2n, 0n)).toThrow('negative address -2')
  })

  it('rejects writes at or beyond the ceiling', () => {
    const memory = new IntcodeMemory([], 8)

    expect(() => memory.write(8n, 1n)).toThrow(
      'address 8 exceeds memory limit of 8 cells',
    )
    memory.write(7n, 1n)
    expect(memory.size).toBe(8)
  })

  it('clones independently', () => {
    const memory = new IntcodeMemory([1n, 2n])
    const copy = memory.clone()
    copy.write(0n, 5n)

    expect(memory.read(0n)).toBe(1n)
    expect(copy.read(0n)).toBe(5n)
  })

  it('snapshots are copies', () => {
    const memory = new IntcodeMemory([1n])
    const snapshot = memory.snapshot()
    snapshot[0] = 7n

    expect(memory.read(0n)).toBe(1n)
  })
})
