// Shared type definitions for the MAVLink protocol core

/**
 * A fully parsed MAVLink message with decoded payload
 */
export interface ParsedMAVLinkMessage {
  timestamp: number
  system_id: number
  component_id: number
  message_id: number
  message_name: string
  sequence: number
  payload: PayloadObject
  protocol_version: 1 | 2
  checksum: number
  crc_ok: boolean
  signature?: Uint8Array
  dialect?: string
}

/**
 * A raw MAVLink frame before payload decoding
 */
export interface MAVLinkFrame {
  magic: number
  length: number
  incompatible_flags?: number // v2 only
  compatible_flags?: number // v2 only
  sequence: number
  system_id: number
  component_id: number
  message_id: number
  payload: Uint8Array
  checksum: number
  signature?: Uint8Array // v2 only, 13 bytes
  crc_ok?: boolean
  protocol_version?: 1 | 2
}

/**
 * Definition of a single field within a message.
 * `type` is always the element type; arrays carry `arrayLength`.
 */
export interface FieldDefinition {
  name: string
  type: string
  arrayLength?: number
  extension?: boolean
}

/**
 * Definition of a complete MAVLink message
 */
export interface MessageDefinition {
  id: number
  name: string
  fields: FieldDefinition[]
}

export type ScalarValue = string | number | bigint

/**
 * Value types that can be encoded/decoded in MAVLink fields
 */
export type FieldValue = ScalarValue | ScalarValue[]

/**
 * A decoded payload object
 */
export type PayloadObject = Record<string, FieldValue>

/**
 * Result of decoding a single field value
 */
export type DecodedValue = { value: FieldValue; bytesRead: number }

/**
 * A message ready for serialization
 */
export interface OutgoingMessage {
  message_name: string
  payload: Record<string, unknown>
  system_id?: number
  component_id?: number
  sequence?: number
  protocol_version?: 1 | 2
}

/**
 * Interface for message parsing functionality
 */
export interface IMessageParser {
  parseBytes(data: Uint8Array): ParsedMAVLinkMessage[]
  decode(frame: MAVLinkFrame): ParsedMAVLinkMessage
  resetBuffer(): void
}

/**
 * Interface for message serialization functionality
 */
export interface IMessageSerializer {
  serializeMessage(message: OutgoingMessage): Uint8Array
}

/**
 * Interface for message registry functionality
 */
export interface IMessageRegistry {
  getMessageDefinition(id: number): MessageDefinition | undefined
  getMessageDefinitionByName(name: string): MessageDefinition | undefined
  supportsMessage(messageId: number): boolean
  supportsMessageName(messageName: string): boolean
  getSupportedMessageIds(): number[]
  getSupportedMessageNames(): string[]
}
