import { FieldValue, getFieldDefaultValue } from '../core'
import { DialectSchema, MessageInstance, buildMessage, loadDialect } from '../dialect'
import { HarnessConfig, resolveConfig } from '../config'
import { DialectError, HeartbeatTimeoutError } from '../errors'
import { StructuredLogger } from '../logger'
import { MavlinkConnection, withConnection } from './connection'
import { allocateTcpPort } from './port'
import { RandomSource, mathRandom } from './random'
import { ChildProcessLauncher, ServerHandle, ServerLauncher, withServer } from './server-process'
import { verifyAll } from './verifier'

export type SessionState =
  | 'INIT'
  | 'PORT_ALLOCATED'
  | 'SERVER_STARTED'
  | 'CONNECTED'
  | 'HEARTBEAT_OK'
  | 'TEARDOWN'
  | 'DONE'

export interface SessionOptions {
  /** Server binary under test. */
  serverCommand: string
  /** Arguments placed before `--dialect`/`--address`. */
  serverArgs?: readonly string[]
  /** Dialect definition path, or an already loaded schema. */
  dialect: string | DialectSchema
  config?: Partial<HarnessConfig>
  logger?: StructuredLogger
  random?: RandomSource
  /** Replaces the child-process launcher. */
  launcher?: ServerLauncher
}

export interface SessionReport {
  dialect: string
  port: number
  verified: string[]
}

const ONBOARD_CONTROLLER = { enumName: 'MAV_TYPE', entry: 'MAV_TYPE_ONBOARD_CONTROLLER', fallback: 18 }
const AUTOPILOT_INVALID = { enumName: 'MAV_AUTOPILOT', entry: 'MAV_AUTOPILOT_INVALID', fallback: 8 }

function enumValue(
  schema: DialectSchema,
  ref: { enumName: string; entry: string; fallback: number }
): number {
  const options = schema.enums.get(ref.enumName)?.options
  if (options) {
    for (const [value, name] of options) {
      if (name === ref.entry) {
        return value
      }
    }
  }
  return ref.fallback
}

/**
 * HEARTBEAT announcing an onboard controller without an autopilot
 */
export function buildHeartbeat(schema: DialectSchema): MessageInstance {
  const descriptor = schema.getMessage('HEARTBEAT')
  if (!descriptor) {
    throw new DialectError(`${schema.name}: dialect does not define HEARTBEAT`)
  }

  const preset: Record<string, FieldValue> = {
    type: enumValue(schema, ONBOARD_CONTROLLER),
    autopilot: enumValue(schema, AUTOPILOT_INVALID),
    base_mode: 0,
    custom_mode: 0,
    system_status: 0,
    mavlink_version: 3,
  }

  const values: Record<string, FieldValue> = {}
  for (const field of descriptor.definition.fields) {
    values[field.name] = preset[field.name] ?? getFieldDefaultValue(field)
  }
  return buildMessage(descriptor, values)
}

/**
 * Server address argument: the server dials out to the harness
 */
export function outboundAddress(host: string, port: number): string {
  return `tcpout:${host}:${port}`
}

/**
 * Run one conformance session against a server binary: handshake, then a
 * round trip of every message type. Teardown runs on every path.
 */
export async function runSession(options: SessionOptions): Promise<SessionReport> {
  const config = resolveConfig(options.config)
  const logger = options.logger ?? new StructuredLogger()
  const random = options.random ?? mathRandom
  const enter = (state: SessionState): void => logger.debug(`state ${state}`)

  enter('INIT')
  const schema =
    typeof options.dialect === 'string' ? await loadDialect(options.dialect) : options.dialect
  logger.info(`dialect ${schema.name}: ${schema.messages.length} message types`)

  const port = await allocateTcpPort(config.host)
  enter('PORT_ALLOCATED')

  const launcher =
    options.launcher ??
    new ChildProcessLauncher(options.serverCommand, options.serverArgs, logger.child('SERVER'))
  const connection = new MavlinkConnection(schema, config, logger.child('CONNECTION'))

  let server: ServerHandle
  try {
    await connection.listen(port)
    server = launcher.launch(['--dialect', schema.name, '--address', outboundAddress(config.host, port)])
  } catch (error) {
    await connection.close()
    throw error
  }
  enter('SERVER_STARTED')

  const report = await withServer(
    server,
    config.exitGraceMs,
    () =>
      withConnection(connection, async () => {
        // one budget covers both the server connecting and its first HEARTBEAT
        const deadline = Date.now() + config.heartbeatTimeoutMs
        if (!(await connection.waitConnected(config.heartbeatTimeoutMs))) {
          throw new HeartbeatTimeoutError(config.heartbeatTimeoutMs)
        }
        enter('CONNECTED')

        const heartbeat = await connection.waitHeartbeat(Math.max(deadline - Date.now(), 1))
        if (!heartbeat) {
          throw new HeartbeatTimeoutError(config.heartbeatTimeoutMs)
        }
        logger.info(`heartbeat from system ${heartbeat.system_id} component ${heartbeat.component_id}`)

        await connection.send(buildHeartbeat(schema))
        enter('HEARTBEAT_OK')

        const verified = await verifyAll(schema, connection, {
          receiveTimeoutMs: config.receiveTimeoutMs,
          random,
          logger,
        })
        enter('TEARDOWN')
        return { dialect: schema.name, port, verified }
      }),
    logger.child('SERVER')
  )

  enter('DONE')
  return report
}
