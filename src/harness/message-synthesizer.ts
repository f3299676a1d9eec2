import { FieldValue, ScalarValue } from '../core'
import { DialectSchema, MessageDescriptor, MessageInstance, buildMessage } from '../dialect'
import { RandomSource, mathRandom } from './random'
import { generateFieldValue } from './value-generator'

/**
 * Build one message of the given type with a random value in every field.
 * Arrays get exactly their declared length; char arrays become one string.
 */
export function synthesizeMessage(
  schema: DialectSchema,
  descriptor: MessageDescriptor,
  random: RandomSource = mathRandom
): MessageInstance {
  const values: Record<string, FieldValue> = {}

  descriptor.fieldNames.forEach((fieldName, i) => {
    const fieldType = descriptor.fieldTypes[i]
    const enumName = descriptor.fieldEnums[fieldName]
    const length = descriptor.arrayLengths[descriptor.orders[i]]

    if (length === 0) {
      values[fieldName] = generateFieldValue(schema, fieldType, enumName, random)
      return
    }

    const items: ScalarValue[] = []
    for (let n = 0; n < length; n++) {
      items.push(generateFieldValue(schema, fieldType, enumName, random))
    }
    values[fieldName] = fieldType === 'char' ? items.join('') : items
  })

  return buildMessage(descriptor, values)
}
