import { FieldValue, ParsedMAVLinkMessage } from '../core'

/**
 * Field-name → value view of a message; the unit of round-trip comparison.
 */
export type CanonicalMessage = { mavpackettype: string } & Record<string, FieldValue>

export function toCanonical(message: ParsedMAVLinkMessage): CanonicalMessage {
  return { ...message.payload, mavpackettype: message.message_name }
}
