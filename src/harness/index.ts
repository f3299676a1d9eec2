export * from './canonical'
export * from './connection'
export * from './message-synthesizer'
export * from './port'
export * from './random'
export * from './ranges'
export * from './server-process'
export * from './session'
export * from './value-generator'
export * from './verifier'
