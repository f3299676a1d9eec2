import { describe, it, expect, beforeAll } from '@jest/globals'
import fc from 'fast-check'
import { DialectSchema, MessageDescriptor, loadDialect } from '../../../src/dialect'
import { UnsupportedFieldTypeError } from '../../../src/errors'
import { synthesizeMessage } from '../../../src/harness/message-synthesizer'
import { seededRandom } from '../../../src/harness/random'
import { fixture } from '../../helpers/fixtures'

function descriptor(schema: DialectSchema, name: string): MessageDescriptor {
  const found = schema.getMessage(name)
  if (!found) {
    throw new Error(`${name} missing from ${schema.name}`)
  }
  return found
}

describe('synthesizeMessage', () => {
  let minimal: DialectSchema
  let extended: DialectSchema

  beforeAll(async () => {
    minimal = await loadDialect(fixture('minimal.xml'))
    extended = await loadDialect(fixture('extended.xml'))
  })

  it('fills FOO with a byte and three floats', () => {
    const message = synthesizeMessage(minimal, descriptor(minimal, 'FOO'), seededRandom(5))
    const { a, b } = message.fields

    expect(message.name).toBe('FOO')
    expect(typeof a).toBe('number')
    expect(Array.isArray(b) && b.length).toBe(3)
  })

  it('gives every field a value of the declared shape', () => {
    const message = synthesizeMessage(extended, descriptor(extended, 'ALL_TYPES'), seededRandom(11))
    const f = message.fields

    expect(Object.keys(f)).toEqual([
      'u8',
      'i8',
      'u16',
      'i16',
      'u32',
      'i32',
      'u64',
      'i64',
      'f',
      'd',
      'c',
      'label',
      'values',
      'mode',
    ])
    expect(typeof f.u64).toBe('bigint')
    expect(typeof f.i64).toBe('bigint')
    expect(typeof f.c === 'string' && f.c.length).toBe(1)
    expect(typeof f.label === 'string' && f.label.length).toBe(10)
    expect(Array.isArray(f.values) && f.values.length).toBe(4)
    expect([0, 16, 64]).toContain(f.mode)
  })

  it('is reproducible for a seed', () => {
    const foo = descriptor(extended, 'ALL_TYPES')
    expect(synthesizeMessage(extended, foo, seededRandom(99)).fields).toEqual(
      synthesizeMessage(extended, foo, seededRandom(99)).fields
    )
  })

  it('gives arrays exactly their declared length', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const random = seededRandom(seed)
        return extended.messages.every((message) => {
          const fields = synthesizeMessage(extended, message, random).fields
          return message.fieldNames.every((name, i) => {
            const length = message.arrayLengths[message.orders[i]]
            const value = fields[name]
            if (length === 0) {
              return !Array.isArray(value)
            }
            return (typeof value === 'string' || Array.isArray(value)) && value.length === length
          })
        })
      }),
      { numRuns: 50 }
    )
  })

  it('fails on a field type it cannot generate', async () => {
    const odd = await loadDialect(fixture('bad-field-type.xml'))
    expect(() => synthesizeMessage(odd, descriptor(odd, 'ODD'))).toThrow(UnsupportedFieldTypeError)
  })
})
