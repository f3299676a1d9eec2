// Value domains used when generating random field values

export interface IntegerRange {
  readonly kind: 'integer'
  readonly low: bigint
  readonly high: bigint
  readonly bits: 8 | 16 | 32 | 64
}

/** Generated as `randint(low, high) / 10`. */
export interface FloatRange {
  readonly kind: 'float'
  readonly low: number
  readonly high: number
}

export interface CharRange {
  readonly kind: 'char'
  readonly low: number
  readonly high: number
}

export type FieldTypeRange = IntegerRange | FloatRange | CharRange

function unsigned(bits: IntegerRange['bits']): IntegerRange {
  return { kind: 'integer', bits, low: 0n, high: (1n << BigInt(bits)) - 1n }
}

function signed(bits: IntegerRange['bits']): IntegerRange {
  const half = 1n << BigInt(bits - 1)
  return { kind: 'integer', bits, low: -half, high: half - 1n }
}

// Float bounds stay far inside the type's range so values survive a float32 round trip
export const FIELD_TYPE_RANGES: Readonly<Record<string, FieldTypeRange>> = Object.freeze({
  uint8_t: unsigned(8),
  uint16_t: unsigned(16),
  uint32_t: unsigned(32),
  uint64_t: unsigned(64),
  int8_t: signed(8),
  int16_t: signed(16),
  int32_t: signed(32),
  int64_t: signed(64),
  float: { kind: 'float', low: -1000, high: 1000 },
  double: { kind: 'float', low: -2000, high: 2000 },
  char: { kind: 'char', low: 32, high: 126 },
})

export function rangeOf(fieldType: string): FieldTypeRange | undefined {
  return Object.prototype.hasOwnProperty.call(FIELD_TYPE_RANGES, fieldType)
    ? FIELD_TYPE_RANGES[fieldType]
    : undefined
}
