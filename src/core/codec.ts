// MAVLink field encoding and decoding
import { FieldDefinition, FieldValue, DecodedValue, PayloadObject, ScalarValue } from './types'

/**
 * Get the size of a single MAVLink type in bytes
 */
export function getTypeSize(type: string): number {
  switch (type) {
    case 'uint8_t':
    case 'int8_t':
    case 'char':
      return 1
    case 'uint16_t':
    case 'int16_t':
      return 2
    case 'uint32_t':
    case 'int32_t':
    case 'float':
      return 4
    case 'uint64_t':
    case 'int64_t':
    case 'double':
      return 8
    default:
      return 1
  }
}

export function isArrayField(field: FieldDefinition): boolean {
  return field.arrayLength !== undefined && field.arrayLength > 0
}

/**
 * Get the total size of a field in bytes
 */
export function getFieldSize(field: FieldDefinition): number {
  const elementSize = getTypeSize(field.type)
  return isArrayField(field) ? elementSize * (field.arrayLength ?? 1) : elementSize
}

/**
 * Get the total size of a fully populated payload
 */
export function getPayloadSize(fields: FieldDefinition[]): number {
  return fields.reduce((total, field) => total + getFieldSize(field), 0)
}

/**
 * Sort fields by MAVLink v2 wire order
 * Core fields sorted by element size (largest first), extension fields last in XML order
 */
export function sortFieldsByWireOrder(fields: FieldDefinition[]): FieldDefinition[] {
  const coreFields: Array<{ field: FieldDefinition; originalIndex: number }> = []
  const extensionFields: FieldDefinition[] = []

  fields.forEach((field, index) => {
    if (field.extension) {
      extensionFields.push(field)
    } else {
      coreFields.push({ field, originalIndex: index })
    }
  })

  // Stable sort: arrays rank by element type, not total size
  coreFields.sort((a, b) => {
    const sizeA = getTypeSize(a.field.type)
    const sizeB = getTypeSize(b.field.type)
    if (sizeB !== sizeA) {
      return sizeB - sizeA
    }
    return a.originalIndex - b.originalIndex
  })

  return [...coreFields.map((c) => c.field), ...extensionFields]
}

/**
 * Get default value for a scalar MAVLink type
 */
export function getDefaultValue(type: string): ScalarValue {
  switch (type) {
    case 'uint64_t':
    case 'int64_t':
      return 0n
    case 'char':
      return '\0'
    default:
      return 0
  }
}

/**
 * Get default value for a field
 */
export function getFieldDefaultValue(field: FieldDefinition): FieldValue {
  if (!isArrayField(field)) {
    return getDefaultValue(field.type)
  }
  if (field.type === 'char') {
    return ''
  }
  return Array.from({ length: field.arrayLength ?? 0 }, () => getDefaultValue(field.type))
}

/**
 * Decode a single scalar from a DataView
 */
export function decodeSingleValue(view: DataView, offset: number, type: string): DecodedValue {
  switch (type) {
    case 'uint8_t':
      return { value: view.getUint8(offset), bytesRead: 1 }
    case 'int8_t':
      return { value: view.getInt8(offset), bytesRead: 1 }
    case 'uint16_t':
      return { value: view.getUint16(offset, true), bytesRead: 2 }
    case 'int16_t':
      return { value: view.getInt16(offset, true), bytesRead: 2 }
    case 'uint32_t':
      return { value: view.getUint32(offset, true), bytesRead: 4 }
    case 'int32_t':
      return { value: view.getInt32(offset, true), bytesRead: 4 }
    case 'uint64_t':
      return { value: view.getBigUint64(offset, true), bytesRead: 8 }
    case 'int64_t':
      return { value: view.getBigInt64(offset, true), bytesRead: 8 }
    case 'float':
      return { value: view.getFloat32(offset, true), bytesRead: 4 }
    case 'double':
      return { value: view.getFloat64(offset, true), bytesRead: 8 }
    case 'char': {
      const charCode = view.getUint8(offset)
      return { value: charCode === 0 ? '\0' : String.fromCharCode(charCode), bytesRead: 1 }
    }
    default:
      return { value: view.getUint8(offset), bytesRead: 1 }
  }
}

/**
 * Decode a field from a DataView
 */
export function decodeField(view: DataView, offset: number, field: FieldDefinition): DecodedValue {
  if (!isArrayField(field)) {
    return decodeSingleValue(view, offset, field.type)
  }

  const arrayLength = field.arrayLength ?? 0

  // Char arrays decode as a string cut at the first NUL
  if (field.type === 'char') {
    const chars: string[] = []
    for (let i = 0; i < arrayLength; i++) {
      const charCode = view.getUint8(offset + i)
      if (charCode === 0) break
      chars.push(String.fromCharCode(charCode))
    }
    return { value: chars.join(''), bytesRead: arrayLength }
  }

  const values: ScalarValue[] = []
  let totalBytes = 0
  for (let i = 0; i < arrayLength; i++) {
    const { value, bytesRead } = decodeSingleValue(view, offset + totalBytes, field.type)
    if (!Array.isArray(value)) {
      values.push(value)
    }
    totalBytes += bytesRead
  }

  return { value: values, bytesRead: totalBytes }
}

/**
 * Decode a payload buffer into an object.
 * MAVLink 2 senders drop trailing zero bytes, so short payloads are zero-extended first.
 */
export function decodePayload(payload: Uint8Array, fields: FieldDefinition[]): PayloadObject {
  const sortedFields = sortFieldsByWireOrder(fields)
  const fullSize = getPayloadSize(sortedFields)

  let bytes = payload
  if (payload.length < fullSize) {
    bytes = new Uint8Array(fullSize)
    bytes.set(payload)
  }

  const result: PayloadObject = {}
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 0

  for (const field of sortedFields) {
    const { value, bytesRead } = decodeField(view, offset, field)
    result[field.name] = value
    offset += bytesRead
  }

  return result
}

function toBigInt(value: unknown): bigint {
  if (typeof value === 'bigint') {
    return value
  }
  return BigInt(Math.trunc(Number(value) || 0))
}

/**
 * Encode a single value to a DataView
 * @returns bytes written
 */
export function encodeSingleValue(
  view: DataView,
  offset: number,
  type: string,
  value: unknown
): number {
  const actualValue = value ?? getDefaultValue(type)

  switch (type) {
    case 'uint8_t':
      view.setUint8(offset, Number(actualValue))
      return 1
    case 'int8_t':
      view.setInt8(offset, Number(actualValue))
      return 1
    case 'uint16_t':
      view.setUint16(offset, Number(actualValue), true)
      return 2
    case 'int16_t':
      view.setInt16(offset, Number(actualValue), true)
      return 2
    case 'uint32_t':
      view.setUint32(offset, Number(actualValue), true)
      return 4
    case 'int32_t':
      view.setInt32(offset, Number(actualValue), true)
      return 4
    case 'uint64_t':
      view.setBigUint64(offset, toBigInt(actualValue), true)
      return 8
    case 'int64_t':
      view.setBigInt64(offset, toBigInt(actualValue), true)
      return 8
    case 'float':
      view.setFloat32(offset, Number(actualValue), true)
      return 4
    case 'double':
      view.setFloat64(offset, Number(actualValue), true)
      return 8
    case 'char':
      view.setUint8(
        offset,
        typeof actualValue === 'string' ? actualValue.charCodeAt(0) || 0 : Number(actualValue)
      )
      return 1
    default:
      view.setUint8(offset, Number(actualValue))
      return 1
  }
}

/**
 * Encode a field to a DataView
 * @returns bytes written
 */
export function encodeField(
  view: DataView,
  offset: number,
  field: FieldDefinition,
  value: unknown
): number {
  if (!isArrayField(field)) {
    return encodeSingleValue(view, offset, field.type, value)
  }

  const arrayLength = field.arrayLength ?? 0

  // Char arrays from string, NUL padded
  if (field.type === 'char' && typeof value === 'string') {
    for (let i = 0; i < arrayLength; i++) {
      view.setUint8(offset + i, i < value.length ? value.charCodeAt(i) : 0)
    }
    return arrayLength
  }

  const items: unknown[] = Array.isArray(value) ? value : [value]
  let totalBytes = 0
  for (let i = 0; i < arrayLength; i++) {
    const item = i < items.length ? items[i] : getDefaultValue(field.type)
    totalBytes += encodeSingleValue(view, offset + totalBytes, field.type, item)
  }
  return totalBytes
}

/**
 * Encode a payload object to its full, untruncated wire form
 */
export function encodePayload(
  message: Record<string, unknown>,
  fields: FieldDefinition[]
): Uint8Array {
  const sortedFields = sortFieldsByWireOrder(fields)
  const buffer = new ArrayBuffer(getPayloadSize(sortedFields))
  const view = new DataView(buffer)
  let offset = 0

  for (const field of sortedFields) {
    offset += encodeField(view, offset, field, message[field.name])
  }

  return new Uint8Array(buffer)
}

/**
 * Drop trailing zero bytes as MAVLink 2 requires, keeping at least one byte
 */
export function truncatePayload(payload: Uint8Array): Uint8Array {
  let length = payload.length
  while (length > 1 && payload[length - 1] === 0) {
    length--
  }
  return length < payload.length ? payload.slice(0, length) : payload
}
