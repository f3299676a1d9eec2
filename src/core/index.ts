// MAVLink protocol core - shared by every dialect
export * from './types'
export * from './crc'
export * from './codec'
export * from './frame'
export * from './parser'
export * from './stream-buffer'
export * from './message-registry'
export * from './message-serializer'
