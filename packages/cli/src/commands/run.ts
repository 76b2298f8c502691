import { logger } from '@intcode/core'
import type { MachineOptions, RunState, Word } from '@intcode/types'
import { STEP_STATES } from '@intcode/types'
import {
  collectOutputs,
  IntcodeMachine,
  loadMachineOptions,
} from '@intcode/vm'
import { Command, InvalidArgumentError } from 'commander'
import { readProgramFile } from '../utils/program-file'

export interface RunCommandOptions {
  input?: Word[]
  text?: string
  ascii?: boolean
  maxSteps?: number
  trace?: boolean
}

export interface ExecuteOptions {
  inputs?: readonly Word[]
  text?: string
  ascii?: boolean
  machine?: MachineOptions
}

// Program output in production order; text runs only in ascii mode
export type OutputSegment =
  | { kind: 'text'; text: string }
  | { kind: 'value'; value: Word }

export interface ExecutionResult {
  segments: OutputSegment[]
  state: Exclude<RunState, typeof STEP_STATES.BLOCKED_ON_OUTPUT>
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return Number(value)
}

export function parseInputValues(value: string): Word[] {
  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return []
  }
  return trimmed.split(',').map((rawToken) => {
    const token = rawToken.trim()
    if (!/^-?\d+$/.test(token)) {
      throw new InvalidArgumentError(
        `Invalid input value "${token}"; expected comma-separated integers.`,
      )
    }
    return BigInt(token)
  })
}

/**
 * Merge command flags over environment options.
 * Tracing raises the logger to debug so trace lines are written.
 */
export function configureRun(
  options: RunCommandOptions,
  envOptions: MachineOptions,
): MachineOptions {
  const machineOptions: MachineOptions = { ...envOptions }
  if (options.maxSteps !== undefined) {
    machineOptions.maxSteps = options.maxSteps
  }
  if (options.trace) {
    machineOptions.trace = true
  }
  if (machineOptions.trace) {
    logger.setLevel('debug')
  }
  return machineOptions
}

/**
 * Run a program until it halts or starves for input
 */
export function executeProgram(
  program: readonly Word[],
  options: ExecuteOptions = {},
): ExecutionResult {
  const machine = new IntcodeMachine(program, options.machine)
  machine.appendInput(...(options.inputs ?? []))
  if (options.text !== undefined) {
    machine.appendText(options.text)
  }

  if (!options.ascii) {
    const { outputs, state } = collectOutputs(machine)
    return {
      segments: outputs.map((value): OutputSegment => ({ kind: 'value', value })),
      state,
    }
  }

  const segments: OutputSegment[] = []
  for (;;) {
    const text = machine.readText()
    if (text !== null) {
      segments.push({ kind: 'text', text })
    }
    if (machine.isFinished) {
      return { segments, state: STEP_STATES.FINISHED }
    }

    const state = machine.run()
    if (state !== STEP_STATES.BLOCKED_ON_OUTPUT) {
      return { segments, state }
    }
    segments.push({ kind: 'value', value: machine.takeOutput() })
  }
}

/**
 * Render segments in order; each value gets a line of its own
 */
export function formatSegments(segments: readonly OutputSegment[]): string {
  let rendered = ''
  for (const segment of segments) {
    if (segment.kind === 'text') {
      rendered += segment.text
      continue
    }
    if (rendered.length > 0 && !rendered.endsWith('\n')) {
      rendered += '\n'
    }
    rendered += `${segment.value}\n`
  }
  return rendered
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Run an Intcode program')
    .argument('<file>', 'Comma-separated program file')
    .option('-i, --input <values>', 'Comma-separated input values', parseInputValues)
    .option('-t, --text <string>', 'Text queued as character codes')
    .option('-a, --ascii', 'Print ASCII outputs as text')
    .option('--max-steps <n>', 'Fault after this many instructions', parseCount)
    .option('--trace', 'Log every executed instruction')
    .action((file: string, options: RunCommandOptions) => {
      const [readError, program] = readProgramFile(file)
      if (readError) {
        logger.error('Failed to load program:', readError)
        process.exit(1)
      }

      const machineOptions = configureRun(options, loadMachineOptions())

      try {
        const result = executeProgram(program, {
          inputs: options.input,
          text: options.text,
          ascii: options.ascii,
          machine: machineOptions,
        })

        const rendered = formatSegments(result.segments)
        if (rendered.length > 0) {
          process.stdout.write(rendered)
        }
        if (result.state === STEP_STATES.BLOCKED_ON_INPUT) {
          logger.warn('Program is waiting for input; stopping')
        }
      } catch (error) {
        logger.error('Program faulted:', error)
        process.exit(1)
      }
    })

  return command
}
