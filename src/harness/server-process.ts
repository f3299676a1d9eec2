import { ChildProcess, spawn } from 'child_process'
import { ServerExitError, errorMessage } from '../errors'
import { StructuredLogger, silentLogger } from '../logger'
import { withTimeout } from './timeout'

export interface ExitStatus {
  code: number | null
  signal: NodeJS.Signals | null
  /** Set when the process could not be started at all. */
  error?: Error
}

/**
 * A running server under test.
 */
export interface ServerHandle {
  readonly description: string
  /** Resolves undefined if the process is still running after `timeoutMs`. */
  waitForExit(timeoutMs: number): Promise<ExitStatus | undefined>
  terminate(): void
}

export interface ServerLauncher {
  launch(args: readonly string[]): ServerHandle
}

class ChildProcessHandle implements ServerHandle {
  private readonly exited: Promise<ExitStatus>

  constructor(
    private readonly child: ChildProcess,
    readonly description: string
  ) {
    this.exited = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, signal) => resolve({ code, signal }))
      child.once('error', (error) => resolve({ code: null, signal: null, error }))
    })
  }

  waitForExit(timeoutMs: number): Promise<ExitStatus | undefined> {
    return withTimeout(this.exited, timeoutMs)
  }

  terminate(): void {
    if (this.child.exitCode === null && this.child.signalCode === null) {
      this.child.kill('SIGTERM')
    }
  }
}

/**
 * Launches the server binary as a child process sharing this process's stdio.
 * `prefixArgs` go before the harness arguments, e.g. a script for an interpreter.
 */
export class ChildProcessLauncher implements ServerLauncher {
  constructor(
    private readonly command: string,
    private readonly prefixArgs: readonly string[] = [],
    private readonly logger: StructuredLogger = silentLogger
  ) {}

  launch(args: readonly string[]): ServerHandle {
    const argv = [...this.prefixArgs, ...args]
    this.logger.info(`starting ${this.command} ${argv.join(' ')}`)
    const child = spawn(this.command, argv, { stdio: 'inherit' })
    return new ChildProcessHandle(child, this.command)
  }
}

/**
 * Wait for the server to exit on its own, escalating to SIGTERM after the
 * grace period. Anything but a clean exit with code 0 is a ServerExitError.
 */
export async function stopServer(
  server: ServerHandle,
  graceMs: number,
  logger: StructuredLogger = silentLogger
): Promise<void> {
  let status = await server.waitForExit(graceMs)
  if (!status) {
    logger.warn(`${server.description} still running after ${graceMs}ms, sending SIGTERM`)
    server.terminate()
    status = await server.waitForExit(graceMs)
  }

  if (!status) {
    throw new ServerExitError(`${server.description} did not exit after SIGTERM`)
  }
  if (status.error) {
    throw new ServerExitError(
      `${server.description} failed to start: ${errorMessage(status.error)}`,
      null,
      null,
      { cause: status.error }
    )
  }
  if (status.code !== 0) {
    throw new ServerExitError(
      `${server.description} exited with non-zero code: ${status.code ?? status.signal ?? 'unknown'}`,
      status.code,
      status.signal
    )
  }
  logger.debug(`${server.description} exited with code 0`)
}

/**
 * Run `body` while the server is up, then stop it. When both fail, the
 * ServerExitError is raised with the body's error as its cause.
 */
export async function withServer<T>(
  server: ServerHandle,
  graceMs: number,
  body: () => Promise<T>,
  logger: StructuredLogger = silentLogger
): Promise<T> {
  let result: T
  try {
    result = await body()
  } catch (error) {
    try {
      await stopServer(server, graceMs, logger)
    } catch (stopError) {
      if (stopError instanceof ServerExitError) {
        throw new ServerExitError(stopError.message, stopError.exitCode, stopError.signal, {
          cause: error,
        })
      }
      throw stopError
    }
    throw error
  }

  await stopServer(server, graceMs, logger)
  return result
}
