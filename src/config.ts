/**
 * Timing and identity settings of a conformance session.
 */
export interface HarnessConfig {
  /** Loopback address both ends of the connection use. */
  host: string
  /** How long to wait for the peer's first HEARTBEAT. */
  heartbeatTimeoutMs: number
  /** How long to wait for each echoed message. */
  receiveTimeoutMs: number
  /** Grace period for the server to exit, applied before and after SIGTERM. */
  exitGraceMs: number
  sourceSystem: number
  sourceComponent: number
}

export const DEFAULT_HARNESS_CONFIG: Readonly<HarnessConfig> = Object.freeze({
  host: '127.0.0.1',
  heartbeatTimeoutMs: 5000,
  receiveTimeoutMs: 5000,
  exitGraceMs: 1000,
  sourceSystem: 255,
  sourceComponent: 0,
})

function requirePositive(name: keyof HarnessConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`)
  }
}

function requireByte(name: keyof HarnessConfig, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new Error(`${name} must be an integer in [0, 255], got ${value}`)
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  const config: HarnessConfig = { ...DEFAULT_HARNESS_CONFIG, ...overrides }
  requirePositive('heartbeatTimeoutMs', config.heartbeatTimeoutMs)
  requirePositive('receiveTimeoutMs', config.receiveTimeoutMs)
  requirePositive('exitGraceMs', config.exitGraceMs)
  requireByte('sourceSystem', config.sourceSystem)
  requireByte('sourceComponent', config.sourceComponent)
  if (config.host.trim() === '') {
    throw new Error('host must not be empty')
  }
  return config
}
