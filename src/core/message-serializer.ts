// Message serializer - encodes messages to MAVLink bytes
import { FieldDefinition, IMessageSerializer, OutgoingMessage } from './types'
import { MessageRegistry } from './message-registry'
import { createFrame } from './frame'
import { encodePayload, getFieldDefaultValue, getPayloadSize, truncatePayload } from './codec'

/**
 * Serializes MAVLink messages to bytes.
 * Delegates message lookup to MessageRegistry.
 */
export class MessageSerializer implements IMessageSerializer {
  constructor(private readonly registry: MessageRegistry) {}

  /**
   * Serialize a message to one MAVLink frame.
   * Missing fields take their defaults; v1 frames omit extension fields
   * and v2 frames drop trailing zero payload bytes.
   */
  serializeMessage(message: OutgoingMessage): Uint8Array {
    const messageDef = this.registry.getMessageDefinitionByName(message.message_name)
    if (!messageDef) {
      throw new Error(`Unknown message type: ${message.message_name}`)
    }

    const crcExtra = this.registry.getCrcExtra(messageDef.id)
    if (crcExtra === undefined) {
      throw new Error(`No CRC_EXTRA defined for message ID ${messageDef.id}`)
    }

    const protocolVersion = message.protocol_version ?? (messageDef.id > 255 ? 2 : 1)
    const fields = this.completeWithDefaults(message.payload, messageDef.fields)
    const fullPayload = encodePayload(fields, messageDef.fields)

    const payload =
      protocolVersion === 2
        ? truncatePayload(fullPayload)
        : fullPayload.slice(0, getPayloadSize(messageDef.fields.filter((f) => !f.extension)))

    return createFrame({
      messageId: messageDef.id,
      payload,
      crcExtra,
      systemId: message.system_id ?? 1,
      componentId: message.component_id ?? 1,
      sequence: message.sequence ?? 0,
      protocolVersion,
    })
  }

  private completeWithDefaults(
    payload: Record<string, unknown>,
    fields: FieldDefinition[]
  ): Record<string, unknown> {
    const complete = { ...payload }
    for (const field of fields) {
      if (complete[field.name] === undefined) {
        complete[field.name] = getFieldDefaultValue(field)
      }
    }
    return complete
  }
}
