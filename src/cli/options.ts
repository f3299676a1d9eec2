import { CommanderError, InvalidArgumentError } from 'commander'
import { errorMessage } from '../errors'
import { LogSink } from '../logger'

/**
 * Commander argument parser for non-negative integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`expected a non-negative integer, got "${value}"`)
  }
  return parsed
}

export const MAX_SEED = 0xffffffff

/**
 * Commander argument parser for seeds; the seeded source keeps 32 bits of state
 */
export function parseSeed(value: string): number {
  const seed = parseInteger(value)
  if (seed > MAX_SEED) {
    throw new InvalidArgumentError(`seed must be at most ${MAX_SEED}, got ${seed}`)
  }
  return seed
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Print a failure as `error: <message>`, followed by its cause chain.
 * Returns the process exit code.
 */
export function reportFailure(error: unknown, sink: LogSink): number {
  if (error instanceof CommanderError) {
    // commander has already printed its own message
    return error.exitCode
  }

  sink.write(`error: ${errorMessage(error)}`)
  let cause = error instanceof Error ? error.cause : undefined
  while (cause !== undefined) {
    sink.write(`  caused by: ${errorMessage(cause)}`)
    cause = cause instanceof Error ? cause.cause : undefined
  }
  return 1
}
