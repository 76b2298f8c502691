/**
 * Host drivers for the common run-to-suspension patterns
 */

import type { RunState, Word, WordLike } from '@intcode/types'
import { ProtocolError, STEP_STATES } from '@intcode/types'
import type { IntcodeMachine } from './machine'

export interface CollectedOutputs {
  outputs: Word[]
  state: Exclude<RunState, typeof STEP_STATES.BLOCKED_ON_OUTPUT>
}

/**
 * Run, taking every output, until the machine needs input or finishes
 */
export function collectOutputs(machine: IntcodeMachine): CollectedOutputs {
  const outputs: Word[] = []
  if (machine.isFinished) {
    return { outputs, state: STEP_STATES.FINISHED }
  }

  for (;;) {
    const state = machine.run()
    if (state === STEP_STATES.BLOCKED_ON_OUTPUT) {
      outputs.push(machine.takeOutput())
      continue
    }
    return { outputs, state }
  }
}

/**
 * Feed `inputs` and run to halt
 * @throws ProtocolError if the program asks for more input than was given
 */
export function runToCompletion(
  machine: IntcodeMachine,
  inputs: readonly WordLike[] = [],
): Word[] {
  machine.appendInput(...inputs)
  const { outputs, state } = collectOutputs(machine)
  if (state === STEP_STATES.BLOCKED_ON_INPUT) {
    throw new ProtocolError('program is waiting for input but none remains', {
      pc: machine.programCounter,
      outputs: outputs.length,
    })
  }
  return outputs
}
