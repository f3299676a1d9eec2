import net from 'net'
import { MessageParser, ParsedMAVLinkMessage } from '../core'
import { DialectSchema, MessageInstance } from '../dialect'
import { HarnessConfig } from '../config'
import { StructuredLogger, silentLogger } from '../logger'
import { errorMessage } from '../errors'
import { withTimeout } from './timeout'

/**
 * What the round-trip verifier needs from a transport.
 */
export interface MessageChannel {
  send(message: MessageInstance): Promise<void>
  /** Next inbound message, or undefined when none arrives in time. */
  recv(timeoutMs: number): Promise<ParsedMAVLinkMessage | undefined>
}

type Waiter = (message: ParsedMAVLinkMessage) => void

/**
 * Inbound (`tcpin`) MAVLink connection: listens on a port and adopts the
 * first peer that connects. Frames are MAVLink 2.
 */
export class MavlinkConnection implements MessageChannel {
  private readonly parser: MessageParser
  private server?: net.Server
  private socket?: net.Socket
  private readonly inbox: ParsedMAVLinkMessage[] = []
  private waiters: Waiter[] = []
  private sequence = 0
  private closed = false
  private readonly peer: Promise<void>
  private readonly peerArrived: () => void

  constructor(
    private readonly schema: DialectSchema,
    private readonly config: Pick<HarnessConfig, 'host' | 'sourceSystem' | 'sourceComponent'>,
    private readonly logger: StructuredLogger = silentLogger
  ) {
    this.parser = schema.codec.createParser()
    let arrived: () => void = () => undefined
    this.peer = new Promise<void>((resolve) => {
      arrived = resolve
    })
    this.peerArrived = arrived
  }

  get connected(): boolean {
    return this.socket !== undefined && !this.socket.destroyed
  }

  listen(port: number): Promise<void> {
    const server = net.createServer((socket) => this.adopt(socket))
    this.server = server

    return new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, this.config.host, () => {
        server.off('error', reject)
        server.on('error', (error) => this.logger.error(`listener failed: ${error.message}`))
        this.logger.debug(`listening on ${this.config.host}:${port}`)
        resolve()
      })
    })
  }

  /**
   * Wait until a peer has been adopted. False if none connects in time.
   */
  async waitConnected(timeoutMs: number): Promise<boolean> {
    if (this.socket) {
      return true
    }
    const adopted = await withTimeout(this.peer.then(() => true), timeoutMs)
    return adopted ?? false
  }

  async send(message: MessageInstance): Promise<void> {
    const socket = this.socket
    if (!socket || socket.destroyed) {
      throw new Error(`cannot send ${message.name}: no peer connected`)
    }

    const bytes = this.schema.codec.encode(message.name, message.fields, {
      systemId: this.config.sourceSystem,
      componentId: this.config.sourceComponent,
      sequence: this.sequence,
    })
    this.sequence = (this.sequence + 1) & 0xff

    await new Promise<void>((resolve, reject) => {
      socket.write(bytes, (error) => (error ? reject(error) : resolve()))
    })
  }

  recv(timeoutMs: number): Promise<ParsedMAVLinkMessage | undefined> {
    const queued = this.inbox.shift()
    if (queued) {
      return Promise.resolve(queued)
    }

    return new Promise((resolve) => {
      const waiter: Waiter = (message) => {
        clearTimeout(timer)
        resolve(message)
      }
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== waiter)
        resolve(undefined)
      }, timeoutMs)
      this.waiters.push(waiter)
    })
  }

  /**
   * Wait for a HEARTBEAT, discarding anything else that arrives first
   */
  async waitHeartbeat(timeoutMs: number): Promise<ParsedMAVLinkMessage | undefined> {
    const deadline = Date.now() + timeoutMs
    for (;;) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) {
        return undefined
      }
      const message = await this.recv(remaining)
      if (!message) {
        return undefined
      }
      if (message.message_name === 'HEARTBEAT' && message.crc_ok) {
        return message
      }
      this.logger.debug(`discarding ${message.message_name} while waiting for HEARTBEAT`)
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    this.socket?.destroy()

    const server = this.server
    if (server?.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
      })
    }
  }

  private adopt(socket: net.Socket): void {
    if (this.socket || this.closed) {
      this.logger.warn(`rejecting extra connection from ${socket.remoteAddress ?? 'unknown'}`)
      socket.destroy()
      return
    }

    this.socket = socket
    this.peerArrived()
    this.logger.debug(`peer connected from ${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`)
    socket.on('data', (chunk: Buffer) => this.receive(chunk))
    socket.on('error', (error) => this.logger.warn(`connection error: ${errorMessage(error)}`))
    socket.on('close', () => this.logger.debug('peer disconnected'))
  }

  private receive(chunk: Uint8Array): void {
    for (const message of this.parser.parseBytes(chunk)) {
      const waiter = this.waiters.shift()
      if (waiter) {
        waiter(message)
      } else {
        this.inbox.push(message)
      }
    }
  }
}

/**
 * Run `body` with the connection, closing it on every exit path
 */
export async function withConnection<T>(
  connection: MavlinkConnection,
  body: (connection: MavlinkConnection) => Promise<T>
): Promise<T> {
  try {
    return await body(connection)
  } finally {
    await connection.close()
  }
}
