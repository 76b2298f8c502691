import { logger } from '@intcode/core'
import { STEP_STATES, StepLimitError } from '@intcode/types'
import { InvalidArgumentError } from 'commander'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createDisasmCommand } from '../commands/disasm'
import {
  configureRun,
  createRunCommand,
  executeProgram,
  formatSegments,
  parseCount,
  parseInputValues,
} from '../commands/run'

const words = (...values: number[]): bigint[] => values.map(BigInt)

describe('Intcode CLI', () => {
  describe('Run Command Options', () => {
    it('should expose the run options', () => {
      const command = createRunCommand()
      const options = command.options.map((option) => option.long)

      expect(command.name()).toBe('run')
      expect(options).toEqual([
        '--input',
        '--text',
        '--ascii',
        '--max-steps',
        '--trace',
      ])
    })

    it('should name the disassembly command', () => {
      expect(createDisasmCommand().name()).toBe('disasm')
    })
  })

  describe('parseCount', () => {
    it('should accept digit strings', () => {
      expect(parseCount('250')).toBe(250)
    })

    it('should reject anything else', () => {
      expect(() => parseCount('ten')).toThrow(InvalidArgumentError)
      expect(() => parseCount('-5')).toThrow(InvalidArgumentError)
    })
  })

  describe('parseInputValues', () => {
    it('should treat an empty value as no input', () => {
      expect(parseInputValues('')).toEqual([])
      expect(parseInputValues('   ')).toEqual([])
    })

    it('should parse comma-separated integers', () => {
      expect(parseInputValues(' 1, -2 ')).toEqual([1n, -2n])
    })

    it('should reject non-integer values', () => {
      expect(() => parseInputValues('1,x')).toThrow(InvalidArgumentError)
      expect(() => parseInputValues('1,,2')).toThrow(InvalidArgumentError)
    })
  })

  describe('configureRun', () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    it('should merge flags over environment options', () => {
      const setLevel = vi.spyOn(logger, 'setLevel').mockImplementation(() => {})

      expect(configureRun({ maxSteps: 5 }, { maxMemory: 64, trace: false })).toEqual({
        maxMemory: 64,
        maxSteps: 5,
        trace: false,
      })
      expect(setLevel).not.toHaveBeenCalled()
    })

    it('should raise the logger to debug when tracing', () => {
      const setLevel = vi.spyOn(logger, 'setLevel').mockImplementation(() => {})

      expect(configureRun({ trace: true }, {})).toEqual({ trace: true })
      expect(setLevel).toHaveBeenCalledWith('debug')
    })

    it('should honour tracing enabled from the environment', () => {
      const setLevel = vi.spyOn(logger, 'setLevel').mockImplementation(() => {})

      configureRun({}, { trace: true })
      expect(setLevel).toHaveBeenCalledWith('debug')
    })
  })

  describe('executeProgram', () => {
    it('should feed inputs and collect outputs', () => {
      expect(executeProgram(words(3, 0, 4, 0, 99), { inputs: [42n] })).toEqual({
        segments: [{ kind: 'value', value: 42n }],
        state: STEP_STATES.FINISHED,
      })
    })

    it('should queue text as character codes', () => {
      const result = executeProgram(words(3, 0, 4, 0, 3, 0, 4, 0, 99), {
        text: 'ok',
      })

      expect(result.segments).toEqual([
        { kind: 'value', value: 111n },
        { kind: 'value', value: 107n },
      ])
    })

    it('should split ASCII text from other outputs', () => {
      const program = words(104, 72, 104, 105, 104, 10, 104, 1000, 99)

      expect(executeProgram(program, { ascii: true })).toEqual({
        segments: [
          { kind: 'text', text: 'Hi\n' },
          { kind: 'value', value: 1000n },
        ],
        state: STEP_STATES.FINISHED,
      })
    })

    it('should keep a number printed before text in program order', () => {
      const result = executeProgram(words(104, 500, 104, 65, 99), { ascii: true })

      expect(result.segments).toEqual([
        { kind: 'value', value: 500n },
        { kind: 'text', text: 'A' },
      ])
      expect(formatSegments(result.segments)).toBe('500\nA')
    })

    it('should stop when the program waits for input', () => {
      expect(executeProgram(words(104, 1, 3, 0, 99))).toEqual({
        segments: [{ kind: 'value', value: 1n }],
        state: STEP_STATES.BLOCKED_ON_INPUT,
      })
    })

    it('should apply machine options', () => {
      expect(() =>
        executeProgram(words(1105, 1, 0), { machine: { maxSteps: 10 } }),
      ).toThrow(StepLimitError)
    })
  })

  describe('formatSegments', () => {
    it('should put each value on its own line', () => {
      expect(
        formatSegments([
          { kind: 'text', text: 'ab' },
          { kind: 'value', value: 7n },
          { kind: 'text', text: 'c\n' },
          { kind: 'value', value: -1n },
        ]),
      ).toBe('ab\n7\nc\n-1\n')
    })
  })
})
