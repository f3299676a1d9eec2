#!/usr/bin/env node
import path from 'path'
import { Command } from 'commander'
import { HarnessConfig } from '../config'
import { LogLevel, LogSink, StructuredLogger, stderrSink } from '../logger'
import { SessionOptions, SessionReport, runSession } from '../harness/session'
import { seededRandom } from '../harness/random'
import { collect, parseInteger, parseSeed, reportFailure } from './options'

export interface MavtestOptions {
  server: string
  dialect: string
  serverArg: string[]
  seed?: number
  heartbeatTimeout?: number
  receiveTimeout?: number
  verbose: boolean
}

export interface MavtestDependencies {
  runSession?: (options: SessionOptions) => Promise<SessionReport>
  /** Receives log lines and failure messages. */
  sink?: LogSink
  /** Receives the final summary line. */
  out?: LogSink
}

const stdoutSink: LogSink = {
  write: (line) => {
    process.stdout.write(`${line}\n`)
  },
}

export function toSessionOptions(options: MavtestOptions, logger: StructuredLogger): SessionOptions {
  const config: Partial<HarnessConfig> = {}
  if (options.heartbeatTimeout !== undefined) {
    config.heartbeatTimeoutMs = options.heartbeatTimeout
  }
  if (options.receiveTimeout !== undefined) {
    config.receiveTimeoutMs = options.receiveTimeout
  }

  return {
    serverCommand: path.resolve(options.server),
    serverArgs: options.serverArg,
    dialect: path.resolve(options.dialect),
    config,
    logger,
    ...(options.seed !== undefined ? { random: seededRandom(options.seed) } : {}),
  }
}

function createProgram(deps: Required<MavtestDependencies>): Command {
  const program = new Command()
  program
    .name('mavtest')
    .description('Check that a MAVLink server echoes every message type of a dialect unchanged')
    .requiredOption('--server <path>', 'Server binary under test')
    .requiredOption('--dialect <path>', 'Dialect XML definition')
    .option('--server-arg <arg>', 'Argument passed to the server before the harness arguments (repeatable)', collect, [])
    .option('--seed <number>', 'Seed for reproducible message contents (0 to 4294967295)', parseSeed)
    .option('--heartbeat-timeout <ms>', 'How long to wait for the first HEARTBEAT', parseInteger)
    .option('--receive-timeout <ms>', 'How long to wait for each echo', parseInteger)
    .option('-v, --verbose', 'Log connection and state details', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.out.write(text.trimEnd()),
      writeErr: (text) => deps.sink.write(text.trimEnd()),
    })
    .action(async () => {
      const options = program.opts<MavtestOptions>()
      const logger = new StructuredLogger(
        deps.sink,
        'MAVTEST',
        options.verbose ? LogLevel.DEBUG : LogLevel.INFO
      )
      const report = await deps.runSession(toSessionOptions(options, logger))
      deps.out.write(`${report.dialect}: ${report.verified.length} message types echoed unchanged`)
    })
  return program
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: readonly string[] = process.argv, deps: MavtestDependencies = {}): Promise<number> {
  const resolved: Required<MavtestDependencies> = {
    runSession: deps.runSession ?? runSession,
    sink: deps.sink ?? stderrSink,
    out: deps.out ?? stdoutSink,
  }
  try {
    await createProgram(resolved).parseAsync(argv)
    return 0
  } catch (error) {
    return reportFailure(error, resolved.sink)
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code
  })
}
