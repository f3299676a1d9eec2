import { describe, it, expect } from '@jest/globals'
import { ReceiveTimeoutError, ServerExitError } from '../../../src/errors'
import {
  ChildProcessLauncher,
  ExitStatus,
  ServerHandle,
  stopServer,
  withServer,
} from '../../../src/harness/server-process'

/**
 * Server whose successive exit waits resolve from a script.
 */
class ScriptedServer implements ServerHandle {
  readonly description = 'fake-server'
  terminated = false
  waits = 0

  constructor(private readonly script: Array<ExitStatus | undefined>) {}

  async waitForExit(): Promise<ExitStatus | undefined> {
    return this.script[this.waits++]
  }

  terminate(): void {
    this.terminated = true
  }
}

describe('stopServer', () => {
  it('accepts a clean exit without signalling', async () => {
    const server = new ScriptedServer([{ code: 0, signal: null }])

    await expect(stopServer(server, 10)).resolves.toBeUndefined()
    expect(server.terminated).toBe(false)
  })

  it('sends SIGTERM after the grace period', async () => {
    const server = new ScriptedServer([undefined, { code: 0, signal: null }])

    await stopServer(server, 10)
    expect(server.terminated).toBe(true)
    expect(server.waits).toBe(2)
  })

  it('fails when the server ignores SIGTERM', async () => {
    const server = new ScriptedServer([undefined, undefined])
    await expect(stopServer(server, 10)).rejects.toThrow('fake-server did not exit after SIGTERM')
  })

  it('fails on a non-zero exit code', async () => {
    const server = new ScriptedServer([{ code: 3, signal: null }])

    const error = await stopServer(server, 10).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ServerExitError)
    if (!(error instanceof ServerExitError)) return
    expect(error.message).toBe('fake-server exited with non-zero code: 3')
    expect(error.exitCode).toBe(3)
  })

  it('fails when the server was killed by a signal', async () => {
    const server = new ScriptedServer([undefined, { code: null, signal: 'SIGTERM' }])
    await expect(stopServer(server, 10)).rejects.toThrow('fake-server exited with non-zero code: SIGTERM')
  })

  it('fails when the server never started', async () => {
    const server = new ScriptedServer([{ code: null, signal: null, error: new Error('spawn ENOENT') }])
    await expect(stopServer(server, 10)).rejects.toThrow('fake-server failed to start: spawn ENOENT')
  })
})

describe('withServer', () => {
  it('returns the body result after a clean exit', async () => {
    const server = new ScriptedServer([{ code: 0, signal: null }])
    await expect(withServer(server, 10, async () => 5)).resolves.toBe(5)
  })

  it('raises the body error when the server exits cleanly', async () => {
    const server = new ScriptedServer([{ code: 0, signal: null }])
    const failure = new ReceiveTimeoutError('FOO', 10)

    await expect(
      withServer(server, 10, async () => {
        throw failure
      })
    ).rejects.toBe(failure)
  })

  it('raises the exit error with the body error as its cause', async () => {
    const server = new ScriptedServer([{ code: 1, signal: null }])
    const failure = new ReceiveTimeoutError('FOO', 10)

    const error = await withServer(server, 10, async () => {
      throw failure
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ServerExitError)
    if (!(error instanceof ServerExitError)) return
    expect(error.message).toBe('fake-server exited with non-zero code: 1')
    expect(error.cause).toBe(failure)
  })

  it('raises the exit error after a successful body', async () => {
    const server = new ScriptedServer([{ code: 1, signal: null }])

    const error = await withServer(server, 10, async () => 'done').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ServerExitError)
    if (!(error instanceof ServerExitError)) return
    expect(error.cause).toBeUndefined()
  })
})

describe('ChildProcessLauncher', () => {
  // Node itself stands in for a server binary; `--` hands the harness arguments to the script
  const launch = (script: string): ServerHandle =>
    new ChildProcessLauncher(process.execPath, ['-e', script, '--']).launch([
      '--dialect',
      'minimal',
      '--address',
      'tcpout:127.0.0.1:1',
    ])

  it('reports the exit code of the process', async () => {
    const status = await launch('process.exit(3)').waitForExit(10_000)
    expect(status).toEqual({ code: 3, signal: null })
  })

  it('stops a process that keeps running', async () => {
    const server = launch('setInterval(() => {}, 1000)')

    await expect(stopServer(server, 200)).rejects.toThrow('exited with non-zero code: SIGTERM')
  })

  it('reports a binary that cannot be started', async () => {
    const server = new ChildProcessLauncher('/nonexistent/mavlink-server').launch([])
    await expect(stopServer(server, 10_000)).rejects.toThrow('/nonexistent/mavlink-server failed to start')
  })
})
