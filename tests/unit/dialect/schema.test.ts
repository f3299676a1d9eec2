import { describe, it, expect, beforeAll } from '@jest/globals'
import {
  DialectSchema,
  RawDialectDefinition,
  buildDialectSchema,
  buildMessage,
  loadDialect,
} from '../../../src/dialect'
import { DialectError } from '../../../src/errors'
import { fixture } from '../../helpers/fixtures'

describe('buildDialectSchema', () => {
  let minimal: DialectSchema
  let extended: DialectSchema

  beforeAll(async () => {
    minimal = await loadDialect(fixture('minimal.xml'))
    extended = await loadDialect(fixture('extended.xml'))
  })

  it('describes HEARTBEAT in declaration and wire order', () => {
    const heartbeat = minimal.getMessage('HEARTBEAT')

    expect(heartbeat?.fieldNames).toEqual([
      'type',
      'autopilot',
      'base_mode',
      'custom_mode',
      'system_status',
      'mavlink_version',
    ])
    expect(heartbeat?.fieldTypes).toEqual(['uint8_t', 'uint8_t', 'uint8_t', 'uint32_t', 'uint8_t', 'uint8_t'])
    expect(heartbeat?.orders).toEqual([1, 2, 3, 0, 4, 5])
    expect(heartbeat?.arrayLengths).toEqual([0, 0, 0, 0, 0, 0])
    expect(heartbeat?.fieldEnums).toEqual({
      type: 'MAV_TYPE',
      autopilot: 'MAV_AUTOPILOT',
      base_mode: 'MAV_MODE_FLAG',
      system_status: 'MAV_STATE',
    })
  })

  it('indexes array lengths by wire position', () => {
    const foo = minimal.getMessage('FOO')
    expect(foo?.orders).toEqual([1, 0])
    expect(foo?.arrayLengths).toEqual([3, 0])

    const allTypes = extended.getMessage('ALL_TYPES')
    expect(allTypes?.orders).toEqual([9, 10, 6, 7, 3, 4, 0, 1, 5, 2, 11, 12, 8, 13])
    expect(allTypes?.arrayLengths).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 4, 0, 0, 0, 10, 0])
  })

  it('adds a terminator entry after the highest enum value', () => {
    const mavType = extended.enums.get('MAV_TYPE')
    expect(mavType?.options.get(201)).toBe('MAV_TYPE_ENUM_END')
    expect(mavType?.options.get(200)).toBe('MAV_TYPE_TEST_RIG')

    const testMode = extended.enums.get('TEST_MODE')
    expect(Array.from(testMode?.options.entries() ?? [])).toEqual([
      [0, 'TEST_MODE_IDLE'],
      [16, 'TEST_MODE_SWEEP'],
      [64, 'TEST_MODE_HOLD'],
      [65, 'TEST_MODE_END'],
      [66, 'TEST_MODE_ENUM_END'],
    ])
  })

  it('keeps the bitmask flag', () => {
    expect(minimal.enums.get('MAV_MODE_FLAG')?.bitmask).toBe(true)
    expect(minimal.enums.get('MAV_STATE')?.bitmask).toBe(false)
  })

  it('freezes the schema', () => {
    expect(Object.isFrozen(minimal)).toBe(true)
    expect(Object.isFrozen(minimal.messages)).toBe(true)
    expect(Object.isFrozen(minimal.getMessage('FOO'))).toBe(true)
    expect(minimal.terminatorSuffix).toBe('_END')
  })

  it('rejects two messages with the same name', () => {
    const raw: RawDialectDefinition = {
      messages: [
        { id: 1, name: 'A', fields: [{ name: 'x', type: 'uint8_t' }] },
        { id: 2, name: 'A', fields: [{ name: 'x', type: 'uint8_t' }] },
      ],
      enums: [],
    }
    expect(() => buildDialectSchema('dup', raw)).toThrow(DialectError)
    expect(() => buildDialectSchema('dup', raw)).toThrow('message A defined twice')
  })
})

describe('buildMessage', () => {
  const schema = buildDialectSchema('inline', {
    messages: [
      {
        id: 1,
        name: 'PAIR',
        fields: [
          { name: 'n', type: 'uint8_t' },
          { name: 'name', type: 'char', arrayLength: 4 },
          { name: 'v', type: 'int16_t', arrayLength: 2 },
        ],
      },
    ],
    enums: [],
  })
  const pair = schema.getMessage('PAIR')

  it('accepts complete values', () => {
    if (!pair) throw new Error('PAIR missing')
    const message = buildMessage(pair, { n: 1, name: 'abcd', v: [1, -1] })

    expect(message.name).toBe('PAIR')
    expect(message.fields).toEqual({ n: 1, name: 'abcd', v: [1, -1] })
  })

  it('rejects a missing field', () => {
    if (!pair) throw new Error('PAIR missing')
    expect(() => buildMessage(pair, { n: 1, name: 'abcd' })).toThrow('PAIR: missing field v')
  })

  it('rejects arrays of the wrong length', () => {
    if (!pair) throw new Error('PAIR missing')
    expect(() => buildMessage(pair, { n: 1, name: 'abc', v: [1, -1] })).toThrow(
      'PAIR: field name must hold exactly 4 items'
    )
    expect(() => buildMessage(pair, { n: 1, name: 'abcd', v: [1] })).toThrow(
      'PAIR: field v must hold exactly 2 items'
    )
  })
})
