/**
 * Program Loader
 *
 * Parses comma-separated program text into memory words.
 */

import type { Safe, Word } from '@intcode/types'
import { ProgramParseError, safeError, safeResult } from '@intcode/types'

const INTEGER_TOKEN = /^-?\d+$/

export function parseProgram(text: string): Safe<Word[], ProgramParseError> {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    return safeError(new ProgramParseError('program text is empty', '', 0))
  }

  const words: Word[] = []
  const tokens = trimmed.split(',')
  for (const [index, rawToken] of tokens.entries()) {
    const token = rawToken.trim()
    if (!INTEGER_TOKEN.test(token)) {
      return safeError(
        new ProgramParseError(
          `invalid program token ${JSON.stringify(token)} at index ${index}`,
          token,
          index,
        ),
      )
    }
    words.push(BigInt(token))
  }

  return safeResult(words)
}
