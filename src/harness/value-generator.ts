import { ScalarValue } from '../core'
import { DialectSchema } from '../dialect'
import { DialectError, UnsupportedFieldTypeError } from '../errors'
import { RandomSource, mathRandom, pick, randomBigInt, randomInt } from './random'
import { rangeOf } from './ranges'

/**
 * Random value for one scalar of the given wire type.
 * 64-bit integers come back as bigint, chars as one-character strings.
 */
export function generateValue(fieldType: string, random: RandomSource = mathRandom): ScalarValue {
  const range = rangeOf(fieldType)
  if (!range) {
    throw new UnsupportedFieldTypeError(fieldType)
  }

  switch (range.kind) {
    case 'integer':
      if (range.bits === 64) {
        return randomBigInt(random, range.low, range.high)
      }
      return randomInt(random, Number(range.low), Number(range.high))
    case 'float':
      return randomInt(random, range.low, range.high) / 10
    case 'char':
      return String.fromCharCode(randomInt(random, range.low, range.high))
  }
}

/**
 * Enum values eligible for live data: every declared key except the terminator entry
 */
export function enumCandidates(schema: DialectSchema, enumName: string): number[] {
  const enumDef = schema.enums.get(enumName)
  if (!enumDef) {
    throw new DialectError(`${schema.name}: unknown enum ${enumName}`)
  }
  const candidates: number[] = []
  for (const [value, name] of enumDef.options) {
    if (!name.endsWith(schema.terminatorSuffix)) {
      candidates.push(value)
    }
  }
  if (candidates.length === 0) {
    throw new DialectError(`${schema.name}: enum ${enumName} has no usable entries`)
  }
  return candidates
}

/**
 * Random value for one field element, honouring an enum constraint when present
 */
export function generateFieldValue(
  schema: DialectSchema,
  fieldType: string,
  enumName: string | undefined,
  random: RandomSource = mathRandom
): ScalarValue {
  if (enumName) {
    return pick(random, enumCandidates(schema, enumName))
  }
  return generateValue(fieldType, random)
}
