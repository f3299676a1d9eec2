/**
 * Source of uniform floats in [0, 1).
 */
export interface RandomSource {
  next(): number
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
}

/**
 * Deterministic source (mulberry32) for reproducible runs.
 * Only the low 32 bits of `seed` are used.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/**
 * Uniform integer in [low, high], both inclusive. Bounds must be safe integers.
 */
export function randomInt(random: RandomSource, low: number, high: number): number {
  return low + Math.floor(random.next() * (high - low + 1))
}

/**
 * Uniform bigint in [low, high], built from 16-bit draws
 */
export function randomBigInt(random: RandomSource, low: bigint, high: bigint): bigint {
  const span = high - low + 1n
  let bits = 0n
  let draw = 0n
  while (1n << bits < span) {
    draw = (draw << 16n) | BigInt(randomInt(random, 0, 0xffff))
    bits += 16n
  }
  return low + (draw % span)
}

/**
 * One element of a non-empty list
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('cannot pick from an empty list')
  }
  return items[randomInt(random, 0, items.length - 1)]
}
