/**
 * Segment 05: Serialization Tests
 *
 * Tests the `[start, end]` array wire form of intervals and sets, including
 * rejection of input that does not decode into a bound pair.
 */

import { describe, it, expect } from 'vitest'
import { Interval } from '../src/interval'
import { IntervalSet } from '../src/interval-set'
import { BoundPairSchema, IntervalSetArraySchema } from '../src/schemas'
import { InvalidInputError, InvalidRangeError } from '../src/errors'

describe('schemas', () => {
  it('accepts strings, nulls and empty strings', () => {
    expect(BoundPairSchema.safeParse(['2021-01-01', null]).success).toBe(true)
    expect(BoundPairSchema.safeParse(['', '']).success).toBe(true)
  })

  it('rejects pairs of the wrong length or type', () => {
    expect(BoundPairSchema.safeParse(['2021-01-01']).success).toBe(false)
    expect(BoundPairSchema.safeParse(['2021-01-01', null, null]).success).toBe(false)
    expect(BoundPairSchema.safeParse([20210101, null]).success).toBe(false)
  })

  it('accepts an empty list of pairs', () => {
    expect(IntervalSetArraySchema.safeParse([]).success).toBe(true)
  })
})

describe('Interval.fromArray', () => {
  it('inverts toArray', () => {
    for (const pair of [
      ['2021-01-01', '2021-01-31'],
      [null, '2021-01-31'],
      ['2021-01-01', null],
      [null, null],
    ] as const) {
      expect(Interval.fromArray(pair).toArray()).toEqual(pair)
    }
  })

  it('reads empty strings as unbounded', () => {
    expect(Interval.fromArray(['', '2021-01-31']).toArray()).toEqual([null, '2021-01-31'])
    expect(Interval.fromArray(['2021-01-01', '']).toArray()).toEqual(['2021-01-01', null])
  })

  it('rejects values that are not a pair', () => {
    expect(() => Interval.fromArray('2021-01-01')).toThrow(InvalidInputError)
    expect(() => Interval.fromArray(['2021-01-01'])).toThrow(InvalidInputError)
    expect(() => Interval.fromArray([1, 2])).toThrow(InvalidInputError)
    expect(() => Interval.fromArray(null)).toThrow(/^Invalid date range array: /)
  })

  it('rejects strings that are not dates', () => {
    expect(() => Interval.fromArray(['2021-13-01', null])).toThrow(InvalidInputError)
  })

  it('rejects a reversed pair as an invalid range', () => {
    expect(() => Interval.fromArray(['2021-02-01', '2021-01-01'])).toThrow(InvalidRangeError)
  })
})

describe('IntervalSet.fromArray', () => {
  it('inverts toArray', () => {
    const pairs = [
      [null, '2021-01-15'],
      ['2021-02-01', '2021-02-10'],
      ['2021-03-01', null],
    ]
    expect(IntervalSet.fromArray(pairs).toArray()).toEqual(pairs)
  })

  it('sorts and merges its input', () => {
    expect(
      IntervalSet.fromArray([
        ['2021-03-01', '2021-03-31'],
        ['2021-01-01', '2021-01-31'],
        ['2021-01-15', '2021-02-15'],
      ]).toArray()
    ).toEqual([
      ['2021-01-01', '2021-02-15'],
      ['2021-03-01', '2021-03-31'],
    ])
  })

  it('rejects a value that is not a list of pairs', () => {
    expect(() => IntervalSet.fromArray({})).toThrow(InvalidInputError)
    expect(() => IntervalSet.fromArray([['2021-01-01', null], 'x'])).toThrow(/^Invalid date range set array: 1: /)
  })

  it('serializes to JSON as a list of pairs', () => {
    const s = IntervalSet.fromArray([['2021-01-01', null]])
    expect(JSON.stringify(s)).toBe('[["2021-01-01",null]]')
  })
})
