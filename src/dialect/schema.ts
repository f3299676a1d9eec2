// Immutable in-memory dialect schema shared by every harness component
import {
  FieldDefinition,
  FieldValue,
  MessageDefinition,
  MessageRegistry,
  computeCrcExtra,
  sortFieldsByWireOrder,
} from '../core'
import { DialectError } from '../errors'
import { DialectCodec } from './codec'

/** Suffix that marks an enum's end-of-range sentinel entry. */
export const TERMINATOR_SUFFIX = '_END'

/** A field as written in the dialect definition. */
export interface RawFieldDefinition {
  name: string
  /** Base wire type; `char[16]` is given as `char` with `arrayLength` 16. */
  type: string
  arrayLength?: number
  enumName?: string
  extension?: boolean
}

export interface RawMessageDefinition {
  id: number
  name: string
  fields: RawFieldDefinition[]
}

export interface RawEnumEntry {
  name: string
  value: number
}

export interface RawEnumDefinition {
  name: string
  bitmask?: boolean
  entries: RawEnumEntry[]
}

export interface RawDialectDefinition {
  messages: RawMessageDefinition[]
  enums: RawEnumDefinition[]
}

export interface EnumDescriptor {
  readonly name: string
  readonly bitmask: boolean
  /** Integer value → symbolic name, including the terminator entry. */
  readonly options: ReadonlyMap<number, string>
}

export interface MessageDescriptor {
  readonly id: number
  readonly name: string
  readonly crcExtra: number
  /** Field names in declaration order. */
  readonly fieldNames: readonly string[]
  /** Base wire types, parallel to `fieldNames`. */
  readonly fieldTypes: readonly string[]
  /** Field name → enum name, for enum-constrained fields only. */
  readonly fieldEnums: Readonly<Record<string, string>>
  /** Declaration position → index in wire order. */
  readonly orders: readonly number[]
  /** Array length per wire-order index; 0 for scalars. */
  readonly arrayLengths: readonly number[]
  readonly definition: MessageDefinition
}

export interface DialectSchema {
  readonly name: string
  readonly messages: readonly MessageDescriptor[]
  readonly enums: ReadonlyMap<string, EnumDescriptor>
  readonly terminatorSuffix: string
  readonly codec: DialectCodec
  getMessage(name: string): MessageDescriptor | undefined
}

export interface MessageInstance {
  readonly name: string
  readonly fields: Readonly<Record<string, FieldValue>>
}

function normaliseType(type: string): string {
  return type === 'uint8_t_mavlink_version' ? 'uint8_t' : type
}

function describeMessage(raw: RawMessageDefinition): MessageDescriptor {
  const fields: FieldDefinition[] = raw.fields.map((field) => ({
    name: field.name,
    type: normaliseType(field.type),
    ...(field.arrayLength ? { arrayLength: field.arrayLength } : {}),
    ...(field.extension ? { extension: true } : {}),
  }))
  const definition: MessageDefinition = { id: raw.id, name: raw.name, fields }

  const wireOrder = sortFieldsByWireOrder(fields)
  const fieldEnums: Record<string, string> = {}
  for (const field of raw.fields) {
    if (field.enumName) {
      fieldEnums[field.name] = field.enumName
    }
  }

  return Object.freeze({
    id: raw.id,
    name: raw.name,
    crcExtra: computeCrcExtra(definition),
    fieldNames: Object.freeze(fields.map((f) => f.name)),
    fieldTypes: Object.freeze(fields.map((f) => f.type)),
    fieldEnums: Object.freeze(fieldEnums),
    orders: Object.freeze(fields.map((f) => wireOrder.indexOf(f))),
    arrayLengths: Object.freeze(wireOrder.map((f) => f.arrayLength ?? 0)),
    definition,
  })
}

function describeEnum(raw: RawEnumDefinition): EnumDescriptor {
  const options = new Map<number, string>()
  let highest = 0
  for (const entry of raw.entries) {
    options.set(entry.value, entry.name)
    highest = Math.max(highest, entry.value)
  }
  const terminator = `${raw.name}_ENUM_END`
  if (!raw.entries.some((entry) => entry.name === terminator)) {
    options.set(highest + 1, terminator)
  }
  return Object.freeze({ name: raw.name, bitmask: raw.bitmask ?? false, options })
}

/**
 * Build the frozen schema for one dialect. Message order is preserved.
 */
export function buildDialectSchema(name: string, raw: RawDialectDefinition): DialectSchema {
  const seenIds = new Map<number, string>()
  const byName = new Map<string, MessageDescriptor>()
  const messages: MessageDescriptor[] = []

  for (const message of raw.messages) {
    const clash = seenIds.get(message.id)
    if (clash !== undefined) {
      throw new DialectError(`message id ${message.id} used by both ${clash} and ${message.name}`)
    }
    if (byName.has(message.name)) {
      throw new DialectError(`message ${message.name} defined twice`)
    }
    const descriptor = describeMessage(message)
    seenIds.set(message.id, message.name)
    byName.set(message.name, descriptor)
    messages.push(descriptor)
  }

  const enums = new Map<string, EnumDescriptor>()
  for (const enumDef of raw.enums) {
    enums.set(enumDef.name, describeEnum(enumDef))
  }

  const codec = new DialectCodec(name, MessageRegistry.fromDefinitions(messages.map((m) => m.definition)))

  return Object.freeze({
    name,
    messages: Object.freeze(messages),
    enums,
    terminatorSuffix: TERMINATOR_SUFFIX,
    codec,
    getMessage: (messageName: string) => byName.get(messageName),
  })
}

function hasLength(value: FieldValue, length: number): boolean {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length === length
  }
  return false
}

/**
 * Construct a message instance, checking every declared field is present
 * and every array has its declared length.
 */
export function buildMessage(
  descriptor: MessageDescriptor,
  values: Readonly<Record<string, FieldValue>>
): MessageInstance {
  const fields: Record<string, FieldValue> = {}

  descriptor.fieldNames.forEach((fieldName, i) => {
    const value = values[fieldName]
    if (value === undefined) {
      throw new Error(`${descriptor.name}: missing field ${fieldName}`)
    }
    const length = descriptor.arrayLengths[descriptor.orders[i]]
    if (length > 0 && !hasLength(value, length)) {
      throw new Error(`${descriptor.name}: field ${fieldName} must hold exactly ${length} items`)
    }
    fields[fieldName] = value
  })

  return Object.freeze({ name: descriptor.name, fields: Object.freeze(fields) })
}
