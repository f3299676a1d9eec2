import type { CanonicalMessage } from './harness/canonical'

export type HarnessErrorKind =
  | 'heartbeat-timeout'
  | 'receive-timeout'
  | 'content-mismatch'
  | 'unsupported-field-type'
  | 'server-exit'

/** Base class for every failure that aborts a conformance session. */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The peer never announced itself with a HEARTBEAT. */
export class HeartbeatTimeoutError extends HarnessError {
  readonly kind = 'heartbeat-timeout'

  constructor(public readonly timeoutMs: number) {
    super(`no heartbeat arrived within ${timeoutMs}ms`)
  }
}

/** No message came back for the one just sent. */
export class ReceiveTimeoutError extends HarnessError {
  readonly kind = 'receive-timeout'

  constructor(
    public readonly messageName: string,
    public readonly timeoutMs: number
  ) {
    super(`cannot receive ${messageName} within ${timeoutMs}ms`)
  }
}

/** The echoed message differs from the locally decoded original. */
export class ContentMismatchError extends HarnessError {
  readonly kind = 'content-mismatch'

  constructor(
    public readonly messageName: string,
    public readonly expected: CanonicalMessage,
    public readonly received: CanonicalMessage,
    reason = 'content mismatch'
  ) {
    super(
      `${messageName}: ${reason}\n` +
        `  expected: ${formatCanonical(expected)}\n` +
        `  received: ${formatCanonical(received)}`
    )
  }
}

/** The value generator has no range for a field type. */
export class UnsupportedFieldTypeError extends HarnessError {
  readonly kind = 'unsupported-field-type'

  constructor(public readonly fieldType: string) {
    super(`Unknown field type: ${fieldType}`)
  }
}

/** The server under test did not exit cleanly. */
export class ServerExitError extends HarnessError {
  readonly kind = 'server-exit'

  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    public readonly signal: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/** A dialect definition could not be read or is inconsistent. */
export class DialectError extends Error {
  constructor(
    message: string,
    public readonly file?: string,
    options?: { cause?: unknown }
  ) {
    super(file ? `${file}: ${message}` : message, options)
    this.name = 'DialectError'
  }
}

export function formatCanonical(message: CanonicalMessage): string {
  return JSON.stringify(message, (_key, value: unknown) =>
    typeof value === 'bigint' ? `${value.toString()}n` : value
  )
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
