// MAVLink frame parsing and building
import { MAVLinkFrame } from './types'
import { MAVLinkCRC } from './crc'

/**
 * MAVLink protocol magic bytes
 */
export const MAVLINK_V1_MAGIC = 0xfe
export const MAVLINK_V2_MAGIC = 0xfd

/**
 * Frame section sizes
 */
export const MAVLINK_V1_HEADER_SIZE = 6 // magic(1) + len(1) + seq(1) + sysid(1) + compid(1) + msgid(1)
export const MAVLINK_V2_HEADER_SIZE = 10 // magic(1) + len(1) + incompat(1) + compat(1) + seq(1) + sysid(1) + compid(1) + msgid(3)
export const MAVLINK_CHECKSUM_SIZE = 2
export const MAVLINK_SIGNATURE_SIZE = 13

export const MAVLINK_IFLAG_SIGNED = 0x01

/**
 * Result of attempting to parse a frame
 */
export interface FrameParseResult {
  frame?: MAVLinkFrame
  bytesConsumed: number
}

/**
 * Options for building a frame
 */
export interface CreateFrameOptions {
  messageId: number
  payload: Uint8Array
  crcExtra: number
  systemId?: number
  componentId?: number
  sequence?: number
  protocolVersion?: 1 | 2
}

/**
 * Parse a single MAVLink frame from the start of a byte buffer.
 * Leading bytes before a magic marker are consumed as garbage; an
 * incomplete frame consumes nothing past the marker so it can be retried
 * once more bytes arrive.
 */
export function parseFrame(
  data: Uint8Array,
  crcExtraTable: Record<number, number>
): FrameParseResult {
  let offset = 0
  while (offset < data.length && data[offset] !== MAVLINK_V1_MAGIC && data[offset] !== MAVLINK_V2_MAGIC) {
    offset++
  }

  if (offset === data.length) {
    return { bytesConsumed: data.length }
  }

  const magic = data[offset]
  const isV2 = magic === MAVLINK_V2_MAGIC
  const headerSize = isV2 ? MAVLINK_V2_HEADER_SIZE : MAVLINK_V1_HEADER_SIZE

  if (data.length - offset < headerSize) {
    return { bytesConsumed: offset }
  }

  const length = data[offset + 1]
  let cursor = offset + 2
  let incompatibleFlags: number | undefined
  let compatibleFlags: number | undefined

  if (isV2) {
    incompatibleFlags = data[cursor++]
    compatibleFlags = data[cursor++]
  }

  const sequence = data[cursor++]
  const systemId = data[cursor++]
  const componentId = data[cursor++]
  let messageId = data[cursor++]
  if (isV2) {
    messageId |= data[cursor++] << 8
    messageId |= data[cursor++] << 16
  }

  const signed = isV2 && ((incompatibleFlags ?? 0) & MAVLINK_IFLAG_SIGNED) !== 0
  const totalLength =
    headerSize + length + MAVLINK_CHECKSUM_SIZE + (signed ? MAVLINK_SIGNATURE_SIZE : 0)

  if (data.length - offset < totalLength) {
    return { bytesConsumed: offset }
  }

  const payload = data.slice(cursor, cursor + length)
  cursor += length

  const checksum = data[cursor] | (data[cursor + 1] << 8)
  const crcOk = MAVLinkCRC.validateWithTable(
    data.subarray(offset + 1, cursor),
    messageId,
    checksum,
    crcExtraTable
  )
  cursor += MAVLINK_CHECKSUM_SIZE

  const frame: MAVLinkFrame = {
    magic,
    length,
    sequence,
    system_id: systemId,
    component_id: componentId,
    message_id: messageId,
    payload,
    checksum,
    crc_ok: crcOk,
    protocol_version: isV2 ? 2 : 1,
  }

  if (isV2) {
    frame.incompatible_flags = incompatibleFlags
    frame.compatible_flags = compatibleFlags
  }
  if (signed) {
    frame.signature = data.slice(cursor, cursor + MAVLINK_SIGNATURE_SIZE)
  }

  return { frame, bytesConsumed: offset + totalLength }
}

/**
 * Create a MAVLink v1 or v2 frame from an encoded payload.
 * Without an explicit version, ids above 255 select v2.
 */
export function createFrame(options: CreateFrameOptions): Uint8Array {
  const { messageId, payload, crcExtra } = options
  const version = options.protocolVersion ?? (messageId > 255 ? 2 : 1)
  const isV2 = version === 2

  if (!isV2 && messageId > 255) {
    throw new Error(`Message ID ${messageId} cannot be sent in a MAVLink v1 frame`)
  }

  const headerSize = isV2 ? MAVLINK_V2_HEADER_SIZE : MAVLINK_V1_HEADER_SIZE
  const frame = new Uint8Array(headerSize + payload.length + MAVLINK_CHECKSUM_SIZE)

  let offset = 0
  frame[offset++] = isV2 ? MAVLINK_V2_MAGIC : MAVLINK_V1_MAGIC
  frame[offset++] = payload.length
  if (isV2) {
    frame[offset++] = 0 // incompat_flags
    frame[offset++] = 0 // compat_flags
  }
  frame[offset++] = (options.sequence ?? 0) & 0xff
  frame[offset++] = options.systemId ?? 1
  frame[offset++] = options.componentId ?? 1
  frame[offset++] = messageId & 0xff
  if (isV2) {
    frame[offset++] = (messageId >> 8) & 0xff
    frame[offset++] = (messageId >> 16) & 0xff
  }

  frame.set(payload, offset)
  offset += payload.length

  const checksum = MAVLinkCRC.calculate(frame.subarray(1, offset), crcExtra)
  frame[offset++] = checksum & 0xff
  frame[offset++] = (checksum >> 8) & 0xff

  return frame
}
