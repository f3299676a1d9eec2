import { describe, it, expect } from '@jest/globals'
import {
  RandomSource,
  pick,
  randomBigInt,
  randomInt,
  seededRandom,
} from '../../../src/harness/random'

const lowest: RandomSource = { next: () => 0 }
const highest: RandomSource = { next: () => 0.999999 }

describe('random', () => {
  it('repeats a sequence for the same seed', () => {
    const a = seededRandom(42)
    const b = seededRandom(42)
    const first = [a.next(), a.next(), a.next()]

    expect([b.next(), b.next(), b.next()]).toEqual(first)
    expect(first.every((n) => n >= 0 && n < 1)).toBe(true)
  })

  it('diverges for different seeds', () => {
    expect(seededRandom(1).next()).not.toBe(seededRandom(2).next())
  })

  it('randomInt covers both bounds', () => {
    expect(randomInt(lowest, -5, 5)).toBe(-5)
    expect(randomInt(highest, -5, 5)).toBe(5)
  })

  it('randomBigInt covers the full 64-bit range', () => {
    expect(randomBigInt(lowest, 0n, 2n ** 64n - 1n)).toBe(0n)
    expect(randomBigInt(highest, 0n, 2n ** 64n - 1n)).toBe(2n ** 64n - 1n)
    expect(randomBigInt(highest, -(2n ** 63n), 2n ** 63n - 1n)).toBe(2n ** 63n - 1n)
  })

  it('pick refuses an empty list', () => {
    expect(pick(lowest, ['a', 'b'])).toBe('a')
    expect(() => pick(lowest, [])).toThrow('cannot pick from an empty list')
  })
})
