import type { Memory, Parameter, Word } from '@intcode/types'
import { ImmediateStoreError } from '@intcode/types'

/**
 * Resolve a parameter to the value it denotes
 */
export function loadParameter(
  memory: Memory,
  relativeBase: Word,
  parameter: Parameter,
): Word {
  switch (parameter.mode) {
    case 'position':
      return memory.read(parameter.value)
    case 'immediate':
      return parameter.value
    case 'relative':
      return memory.read(relativeBase + parameter.value)
  }
}

/**
 * Write through a store parameter; immediate parameters cannot be targets
 */
export function storeParameter(
  memory: Memory,
  relativeBase: Word,
  parameter: Parameter,
  value: Word,
): void {
  switch (parameter.mode) {
    case 'position':
      memory.write(parameter.value, value)
      return
    case 'relative':
      memory.write(relativeBase + parameter.value, value)
      return
    case 'immediate':
      throw new ImmediateStoreError(parameter.value)
  }
}
