import net from 'net'
import { MessageParser, ParsedMAVLinkMessage, PayloadObject } from '../../src/core'
import { DialectSchema } from '../../src/dialect'
import { ExitStatus, ServerHandle, ServerLauncher } from '../../src/harness/server-process'
import { withTimeout } from '../../src/harness/timeout'

/**
 * echo: heartbeat, then echo everything after the harness heartbeat
 * silent: heartbeat, then never answer
 * corrupt: like echo, but bump field `a` of FOO
 * mute: connect without ever sending a heartbeat
 * absent: never connect
 */
export type PeerMode = 'echo' | 'silent' | 'corrupt' | 'mute' | 'absent'

export interface FakeServerOptions {
  mode: PeerMode
  /** Exit code reported once the harness closes the connection. */
  exitCode?: number
}

const PEER_HEARTBEAT = {
  type: 2,
  autopilot: 3,
  base_mode: 0,
  custom_mode: 0,
  system_status: 4,
  mavlink_version: 3,
}

export function parseAddress(args: readonly string[]): { host: string; port: number } {
  const value = args[args.indexOf('--address') + 1] ?? ''
  const match = /^tcpout:(.+):(\d+)$/.exec(value)
  if (!match) {
    throw new Error(`no tcpout address in ${args.join(' ')}`)
  }
  return { host: match[1], port: Number(match[2]) }
}

/**
 * In-process stand-in for a MAVLink server binary, dialling the harness
 * the way a real server does for `--address tcpout:<host>:<port>`.
 */
export class FakeServer implements ServerHandle {
  readonly description = 'fake-server'
  /** Every valid message the harness sent, handshake included. */
  readonly received: ParsedMAVLinkMessage[] = []
  terminated = false
  socketError?: Error

  private readonly exited: Promise<ExitStatus>
  private readonly finish: (status: ExitStatus) => void
  private readonly parser: MessageParser
  private socket?: net.Socket
  private handshakeDone = false

  constructor(
    private readonly schema: DialectSchema,
    args: readonly string[],
    private readonly options: FakeServerOptions
  ) {
    let finish: (status: ExitStatus) => void = () => undefined
    this.exited = new Promise<ExitStatus>((resolve) => {
      finish = resolve
    })
    this.finish = finish
    this.parser = schema.codec.createParser()

    if (options.mode === 'absent') {
      this.finish({ code: options.exitCode ?? 0, signal: null })
      return
    }

    const { host, port } = parseAddress(args)
    const socket = net.connect(port, host)
    this.socket = socket
    socket.on('connect', () => {
      if (options.mode !== 'mute') {
        socket.write(this.encode('HEARTBEAT', PEER_HEARTBEAT))
      }
    })
    socket.on('data', (chunk: Buffer) => this.handle(chunk))
    // a reset from the harness closing first is not a server failure
    socket.on('error', (error) => {
      this.socketError = error
    })
    socket.on('close', () => this.finish({ code: options.exitCode ?? 0, signal: null }))
  }

  waitForExit(timeoutMs: number): Promise<ExitStatus | undefined> {
    return withTimeout(this.exited, timeoutMs)
  }

  terminate(): void {
    this.terminated = true
    this.socket?.destroy()
    this.finish({ code: null, signal: 'SIGTERM' })
  }

  private encode(name: string, payload: PayloadObject): Uint8Array {
    return this.schema.codec.encode(name, payload, { systemId: 1, componentId: 1 })
  }

  private handle(chunk: Uint8Array): void {
    for (const message of this.parser.parseBytes(chunk)) {
      if (!message.crc_ok) {
        continue
      }
      this.received.push(message)

      if (!this.handshakeDone) {
        this.handshakeDone = message.message_name === 'HEARTBEAT'
        continue
      }
      if (this.options.mode === 'silent') {
        continue
      }

      let payload = message.payload
      if (this.options.mode === 'corrupt' && message.message_name === 'FOO') {
        payload = { ...payload, a: (Number(payload.a) + 1) % 256 }
      }
      this.socket?.write(this.encode(message.message_name, payload))
    }
  }
}

export class FakeLauncher implements ServerLauncher {
  readonly launches: Array<{ args: string[]; server: FakeServer }> = []

  constructor(
    private readonly schema: DialectSchema,
    private readonly options: FakeServerOptions
  ) {}

  launch(args: readonly string[]): FakeServer {
    const server = new FakeServer(this.schema, args, this.options)
    this.launches.push({ args: [...args], server })
    return server
  }
}
