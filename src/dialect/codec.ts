import {
  MessageParser,
  MessageRegistry,
  MessageSerializer,
  OutgoingMessage,
  ParsedMAVLinkMessage,
} from '../core'

export interface EncodeOptions {
  systemId?: number
  componentId?: number
  sequence?: number
  protocolVersion?: 1 | 2
}

/**
 * The MAVLink core bound to one dialect's message registry.
 */
export class DialectCodec {
  private readonly serializer: MessageSerializer

  constructor(
    readonly dialectName: string,
    readonly registry: MessageRegistry
  ) {
    this.serializer = new MessageSerializer(registry)
  }

  /**
   * Encode one message to a complete frame. Defaults to MAVLink 2.
   */
  encode(
    messageName: string,
    payload: Record<string, unknown>,
    options: EncodeOptions = {}
  ): Uint8Array {
    const message: OutgoingMessage = {
      message_name: messageName,
      payload,
      system_id: options.systemId,
      component_id: options.componentId,
      sequence: options.sequence,
      protocol_version: options.protocolVersion ?? 2,
    }
    return this.serializer.serializeMessage(message)
  }

  /**
   * Decode every complete frame in `bytes` with a fresh parser
   */
  decode(bytes: Uint8Array): ParsedMAVLinkMessage[] {
    return this.createParser().parseBytes(bytes)
  }

  /**
   * A streaming parser with its own reassembly buffer
   */
  createParser(): MessageParser {
    return new MessageParser(this.registry, this.dialectName)
  }
}
