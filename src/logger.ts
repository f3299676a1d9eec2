/**
 * Structured logging for the harness and its CLIs.
 * Lines read `[level] [component] message` and go to a pluggable sink.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/** Anything that accepts whole log lines. */
export interface LogSink {
  write(line: string): void
}

export const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`)
  },
}

export const silentSink: LogSink = {
  write: () => undefined,
}

export class StructuredLogger {
  constructor(
    private readonly sink: LogSink = stderrSink,
    private readonly component: string = 'HARNESS',
    private readonly minLevel: LogLevel = LogLevel.INFO
  ) {}

  /**
   * Logger for a sub-component sharing this sink and level
   */
  child(component: string): StructuredLogger {
    return new StructuredLogger(this.sink, component, this.minLevel)
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message)
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message)
  }

  warn(message: string): void {
    this.log(LogLevel.WARN, message)
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message)
  }

  log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return
    }
    this.sink.write(`[${level}] [${this.component}] ${message}`)
  }
}

export const silentLogger = new StructuredLogger(silentSink)
