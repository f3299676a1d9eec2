// MAVLink CRC calculation using X.25 (MCRF4XX) algorithm
import { MessageDefinition } from './types'
import { sortFieldsByWireOrder } from './codec'

/**
 * Initial CRC value for X.25 algorithm
 */
export const X25_INIT_CRC = 0xffff

/**
 * MAVLink CRC calculator using X.25 (MCRF4XX) algorithm
 */
export class MAVLinkCRC {
  /**
   * Fold one byte into a running CRC
   */
  static accumulateByte(byte: number, crc: number): number {
    let tmp = (byte & 0xff) ^ (crc & 0xff)
    tmp = (tmp ^ (tmp << 4)) & 0xff
    return ((crc >> 8) ^ (tmp << 8) ^ (tmp << 3) ^ (tmp >> 4)) & 0xffff
  }

  /**
   * Fold a byte sequence into a running CRC
   */
  static accumulate(data: Uint8Array | number[], crc: number = X25_INIT_CRC): number {
    let result = crc
    for (let i = 0; i < data.length; i++) {
      result = MAVLinkCRC.accumulateByte(data[i], result)
    }
    return result
  }

  /**
   * Fold the ASCII bytes of a string into a running CRC
   */
  static accumulateString(text: string, crc: number = X25_INIT_CRC): number {
    let result = crc
    for (let i = 0; i < text.length; i++) {
      result = MAVLinkCRC.accumulateByte(text.charCodeAt(i), result)
    }
    return result
  }

  /**
   * Calculate CRC for MAVLink message data with CRC_EXTRA seed
   * @param data Message bytes (header + payload, excluding magic and checksum)
   * @param crcExtra CRC_EXTRA byte for the message type
   */
  static calculate(data: Uint8Array, crcExtra: number): number {
    return MAVLinkCRC.accumulateByte(crcExtra, MAVLinkCRC.accumulate(data))
  }

  static validate(data: Uint8Array, crcExtra: number, receivedChecksum: number): boolean {
    return this.calculate(data, crcExtra) === receivedChecksum
  }

  /**
   * Validate using CRC_EXTRA lookup table
   * @returns false if invalid or unknown message
   */
  static validateWithTable(
    data: Uint8Array,
    messageId: number,
    receivedChecksum: number,
    crcExtraTable: Record<number, number>
  ): boolean {
    const crcExtra = crcExtraTable[messageId]
    if (crcExtra === undefined) {
      return false
    }
    return this.validate(data, crcExtra, receivedChecksum)
  }
}

/**
 * Compute the CRC_EXTRA seed of a message from its definition.
 * Covers the message name and every non-extension field in wire order.
 */
export function computeCrcExtra(definition: MessageDefinition): number {
  let crc = MAVLinkCRC.accumulateString(`${definition.name} `)

  for (const field of sortFieldsByWireOrder(definition.fields)) {
    if (field.extension) {
      continue
    }
    crc = MAVLinkCRC.accumulateString(`${field.type} `, crc)
    crc = MAVLinkCRC.accumulateString(`${field.name} `, crc)
    if (field.arrayLength) {
      crc = MAVLinkCRC.accumulateByte(field.arrayLength, crc)
    }
  }

  return (crc & 0xff) ^ (crc >> 8)
}
