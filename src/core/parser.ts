// Streaming MAVLink parser
import { ParsedMAVLinkMessage, MAVLinkFrame, IMessageParser } from './types'
import { MessageRegistry } from './message-registry'
import { StreamBuffer } from './stream-buffer'
import { parseFrame } from './frame'
import { decodePayload } from './codec'

/**
 * Turns a byte stream into decoded messages.
 * Partial frames are held until the rest of their bytes arrive.
 */
export class MessageParser implements IMessageParser {
  private readonly buffer = new StreamBuffer()

  constructor(
    private readonly registry: MessageRegistry,
    private readonly dialectName?: string
  ) {}

  /**
   * Parse incoming bytes and return any complete messages
   */
  parseBytes(data: Uint8Array): ParsedMAVLinkMessage[] {
    const results: ParsedMAVLinkMessage[] = []
    if (data.length === 0) {
      return results
    }

    this.buffer.append(data)
    const pending = this.buffer.contents()
    const crcExtraTable = this.registry.getCrcExtraTable()
    let offset = 0

    while (offset < pending.length) {
      const { frame, bytesConsumed } = parseFrame(pending.subarray(offset), crcExtraTable)
      if (frame) {
        results.push(this.decode(frame))
      }
      if (bytesConsumed === 0) {
        break
      }
      offset += bytesConsumed
    }

    this.buffer.consume(offset)
    return results
  }

  resetBuffer(): void {
    this.buffer.reset()
  }

  /**
   * Decode a MAVLink frame into a parsed message
   */
  decode(frame: MAVLinkFrame): ParsedMAVLinkMessage {
    const messageDef = this.registry.getMessageDefinition(frame.message_id)
    const protocolVersion: 1 | 2 = frame.protocol_version ?? (frame.magic === 0xfd ? 2 : 1)
    const base = {
      timestamp: Date.now(),
      system_id: frame.system_id,
      component_id: frame.component_id,
      message_id: frame.message_id,
      sequence: frame.sequence,
      protocol_version: protocolVersion,
      checksum: frame.checksum,
      crc_ok: frame.crc_ok ?? true,
      signature: frame.signature,
      dialect: this.dialectName,
    }

    if (!messageDef) {
      return {
        ...base,
        message_name: `UNKNOWN_${frame.message_id}`,
        payload: { raw_payload: Array.from(frame.payload) },
      }
    }

    return {
      ...base,
      message_name: messageDef.name,
      payload: decodePayload(frame.payload, messageDef.fields),
    }
  }
}
