import { describe, it, expect, beforeAll, afterAll } from '@jest/globals'
import { rm } from 'fs/promises'
import path from 'path'
import { DialectSchema, MessageInstance, loadDialect } from '../../../src/dialect'
import { decodeLocally } from '../../../src/harness/verifier'
import { generateDialectFile } from '../../../src/cli/mavgen'
import { fixture } from '../../helpers/fixtures'

// Written inside the test tree so ts-jest compiles it against the sources
const OUTPUT_DIR = path.resolve(__dirname, '../../generated')

interface GeneratedDialect {
  DIALECT_NAME: string
  CRC_EXTRA: Record<number, number>
  dialect: DialectSchema
  buildFoo(fields: { a: number; b: number[] }): MessageInstance
}

function isGeneratedDialect(value: unknown): value is GeneratedDialect {
  return (
    typeof value === 'object' &&
    value !== null &&
    'DIALECT_NAME' in value &&
    'dialect' in value &&
    'buildFoo' in value &&
    typeof value.buildFoo === 'function'
  )
}

describe('generated dialect module', () => {
  let generated: GeneratedDialect
  let expected: DialectSchema

  beforeAll(async () => {
    const target = await generateDialectFile(fixture('extended.xml'), {
      output: path.join(OUTPUT_DIR, 'extended.ts'),
      runtimeImport: '../../src',
    })
    const loaded: unknown = require(target)
    if (!isGeneratedDialect(loaded)) {
      throw new Error(`${target} does not export a dialect module`)
    }
    generated = loaded
    expected = await loadDialect(fixture('extended.xml'))
  })

  afterAll(async () => {
    await rm(OUTPUT_DIR, { recursive: true, force: true })
  })

  it('exports the dialect under its file name', () => {
    expect(generated.DIALECT_NAME).toBe('extended')
    expect(generated.dialect.name).toBe('extended')
  })

  it('describes the same messages as the loaded definition', () => {
    const summary = (schema: DialectSchema) =>
      schema.messages.map((m) => ({
        id: m.id,
        name: m.name,
        crcExtra: m.crcExtra,
        orders: m.orders,
        arrayLengths: m.arrayLengths,
      }))

    expect(summary(generated.dialect)).toEqual(summary(expected))
    expect(generated.CRC_EXTRA[0]).toBe(50)
    expect([...generated.dialect.enums.keys()]).toEqual([...expected.enums.keys()])
  })

  it('builds messages that survive an encode and decode', () => {
    const message = generated.buildFoo({ a: 1, b: [1, 2, 3] })
    const decoded = decodeLocally(generated.dialect, message)

    expect(decoded.message_name).toBe('FOO')
    expect(decoded.crc_ok).toBe(true)
    expect(decoded.payload).toEqual({ a: 1, b: [1, 2, 3] })
  })

  it('rejects arrays of the wrong length', () => {
    expect(() => generated.buildFoo({ a: 1, b: [1, 2] })).toThrow('FOO: field b must hold exactly 3 items')
  })
})
