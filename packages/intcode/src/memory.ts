/**
 * Intcode Memory
 *
 * Growable word-addressed store. Cells beyond the current extent read as
 * zero; writing past the extent zero-fills the gap.
 */

import type { Memory, Word } from '@intcode/types'
import { AddressError } from '@intcode/types'
import { MEMORY_CONFIG } from './config'

export class IntcodeMemory implements Memory {
  private cells: Word[]
  private readonly maxSize: number

  constructor(initial: readonly Word[] = [], maxSize: number = MEMORY_CONFIG.MAX_SIZE) {
    this.cells = [...initial]
    this.maxSize = maxSize
  }

  get size(): number {
    return this.cells.length
  }

  read(address: Word): Word {
    if (address < 0n) {
      throw new AddressError(`negative address ${address}`, address)
    }
    if (address >= BigInt(this.cells.length)) {
      return 0n
    }
    return this.cells[Number(address)] ?? 0n
  }

  write(address: Word, value: Word): void {
    if (address < 0n) {
      throw new AddressError(`negative address ${address}`, address)
    }
    if (address >= BigInt(this.maxSize)) {
      throw new AddressError(
        `address ${address} exceeds memory limit of ${this.maxSize} cells`,
        address,
      )
    }

    const index = Number(address)
    while (this.cells.length <= index) {
      this.cells.push(0n)
    }
    this.cells[index] = value
  }

  snapshot(): Word[] {
    return [...this.cells]
  }

  clone(): IntcodeMemory {
    return new IntcodeMemory(this.cells, this.maxSize)
  }
}
