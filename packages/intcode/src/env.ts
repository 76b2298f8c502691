import { createEnvSchema, loadEnvVariables } from '@intcode/core'
import type { MachineOptions } from '@intcode/types'
import { z } from 'zod'

const count = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)

export const intcodeEnvSchema = createEnvSchema({
  INTCODE_MAX_STEPS: count.optional(),
  INTCODE_MAX_MEMORY: count
    .refine((value) => value > 0, 'must be positive')
    .optional(),
  INTCODE_TRACE: z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1')
    .optional(),
})

export type IntcodeEnv = z.infer<typeof intcodeEnvSchema>

export function machineOptionsFromEnv(env: IntcodeEnv): MachineOptions {
  const options: MachineOptions = {}
  if (env.INTCODE_MAX_STEPS !== undefined) {
    options.maxSteps = env.INTCODE_MAX_STEPS
  }
  if (env.INTCODE_MAX_MEMORY !== undefined) {
    options.maxMemory = env.INTCODE_MAX_MEMORY
  }
  if (env.INTCODE_TRACE !== undefined) {
    options.trace = env.INTCODE_TRACE
  }
  return options
}

/**
 * Machine options from the environment (and an optional .env file)
 */
export function loadMachineOptions(
  envPath?: string,
  source?: Record<string, string | undefined>,
): MachineOptions {
  return machineOptionsFromEnv(loadEnvVariables(intcodeEnvSchema, envPath, source))
}
