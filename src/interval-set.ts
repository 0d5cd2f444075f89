/**
 * Interval Set
 *
 * An immutable, normalized union of intervals. Ranges are kept sorted by
 * start, with no two ranges overlapping or adjacent, so only the first range
 * can be unbounded at the start and only the last at the end. Every operation
 * returns a new set that keeps those invariants.
 */

import type { LocalDate } from './time-date'
import {
  type Bound,
  unbounded,
  shiftBound,
  compareStarts,
  laterEnd,
  endsBeforeStart,
} from './bound'
import { Interval, requireDate } from './interval'
import { IntervalSetArraySchema, describeIssues, type SerializedIntervalSet } from './schemas'
import { InvalidInputError } from './errors'

export class IntervalSet implements Iterable<Interval> {
  private static readonly EMPTY = new IntervalSet([])

  readonly ranges: readonly Interval[]

  private constructor(ranges: readonly Interval[]) {
    this.ranges = Object.freeze([...ranges])
    Object.freeze(this)
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  static empty(): IntervalSet {
    return IntervalSet.EMPTY
  }

  /** Builds a set by inserting each range in turn; input order does not matter. */
  static of(ranges: Iterable<Interval> | Interval = []): IntervalSet {
    const items = ranges instanceof Interval ? [ranges] : ranges
    let set = IntervalSet.EMPTY
    for (const range of items) {
      set = set.insert(range)
    }
    return set
  }

  /**
   * Inverse of {@link IntervalSet.toArray}. Pairs may come in any order and
   * may overlap.
   *
   * @throws InvalidInputError if the value is not a list of date pairs
   * @throws InvalidRangeError if a pair ends before it starts
   */
  static fromArray(value: unknown): IntervalSet {
    const parsed = IntervalSetArraySchema.safeParse(value)
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid date range set array: ${describeIssues(parsed.error)}`)
    }
    return IntervalSet.of(parsed.data.map(([start, end]) => Interval.make(start, end)))
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get size(): number {
    return this.ranges.length
  }

  isEmpty(): boolean {
    return this.ranges.length === 0
  }

  isNotEmpty(): boolean {
    return !this.isEmpty()
  }

  [Symbol.iterator](): Iterator<Interval> {
    return this.ranges[Symbol.iterator]()
  }

  /** @throws InvalidInputError if `date` is not a valid `YYYY-MM-DD` date */
  contains(date: LocalDate | string): boolean {
    const day = requireDate(date)
    return this.ranges.some((range) => range.contains(day))
  }

  equals(other: IntervalSet): boolean {
    if (this.ranges.length !== other.ranges.length) return false
    return this.ranges.every((range, i) => {
      const counterpart = other.ranges[i]
      return counterpart !== undefined && range.equals(counterpart)
    })
  }

  // --------------------------------------------------------------------------
  // Single-range maintenance
  // --------------------------------------------------------------------------

  /**
   * Splits the ranges around `range`'s start. `before` holds the ranges that
   * start strictly earlier; when `range` has no start it is always empty.
   * Only the last of `before` and a prefix of `after` can touch `range`.
   */
  private partition(range: Interval): { before: Interval[]; after: Interval[] } {
    const index = this.ranges.findIndex((r) => compareStarts(r.startBound, range.startBound) >= 0)
    const split = index === -1 ? this.ranges.length : index
    return {
      before: this.ranges.slice(0, split),
      after: this.ranges.slice(split),
    }
  }

  /** Adds the days of `range`, merging every range it overlaps or touches. */
  insert(range: Interval): IntervalSet {
    const { before, after } = this.partition(range)
    let start: Bound = range.startBound
    let end: Bound = range.endBound

    const lastBefore = before.at(-1)
    if (lastBefore !== undefined) {
      // Starts earlier and never ends: already covers the new range.
      if (!lastBefore.hasEnd()) return this

      if (touches(lastBefore.endBound, start)) {
        before.pop()
        start = lastBefore.startBound
        end = laterEnd(end, lastBefore.endBound)
      }
    }

    if (end.kind === 'unbounded') {
      return new IntervalSet([...before, widen(range, start, end)])
    }

    let next = after[0]
    while (next !== undefined && touches(end, next.startBound)) {
      after.shift()
      if (!next.hasEnd()) {
        return new IntervalSet([...before, widen(range, start, unbounded)])
      }
      end = laterEnd(end, next.endBound)
      next = after[0]
    }

    return new IntervalSet([...before, widen(range, start, end), ...after])
  }

  /** Removes the days of `range`, splitting ranges it cuts through. */
  remove(range: Interval): IntervalSet {
    const { before, after } = this.partition(range)
    const fragments: Interval[] = []

    const lastBefore = before.pop()
    if (lastBefore !== undefined) {
      fragments.push(...lastBefore.subtract(range))
    }

    if (!range.hasEnd()) {
      return new IntervalSet([...before, ...fragments])
    }

    // Unlike insert there is no adjacency slack: a range starting the day
    // after `range` ends is untouched.
    let next = after[0]
    while (next !== undefined && !endsBeforeStart(range.endBound, next.startBound)) {
      after.shift()
      fragments.push(...next.subtract(range))
      next = after[0]
    }

    return new IntervalSet([...before, ...fragments, ...after])
  }

  // --------------------------------------------------------------------------
  // Set operations
  // --------------------------------------------------------------------------

  union(other: IntervalSet): IntervalSet {
    return other.ranges.reduce<IntervalSet>((set, range) => set.insert(range), this)
  }

  subtract(other: IntervalSet): IntervalSet {
    return other.ranges.reduce<IntervalSet>((set, range) => set.remove(range), this)
  }

  /**
   * Two-pointer walk over both sorted sets. After each comparison the
   * trailing fragment, if any, stays as its owner's candidate and the other
   * side moves on; with no trailing fragment both sides move on.
   */
  intersect(other: IntervalSet): IntervalSet {
    const result: Interval[] = []
    let i = 0
    let j = 0
    let mine = this.ranges[i]
    let theirs = other.ranges[j]

    while (mine !== undefined && theirs !== undefined) {
      const { intersection, after, afterFromThis } = mine.compare(theirs)
      if (intersection !== null) result.push(intersection)

      if (after === null) {
        mine = this.ranges[++i]
        theirs = other.ranges[++j]
      } else if (afterFromThis === true) {
        mine = after
        theirs = other.ranges[++j]
      } else {
        theirs = after
        mine = this.ranges[++i]
      }
    }

    // Consecutive pieces are always separated by a gap in one of the inputs,
    // so the result is already normalized.
    return new IntervalSet(result)
  }

  // --------------------------------------------------------------------------
  // Closed-range operations
  // --------------------------------------------------------------------------

  /** Total number of days covered. */
  lengthInDays(): number {
    return this.ranges.reduce((total, range) => total + range.lengthInDays(), 0)
  }

  /**
   * Every covered day in ascending order, lazily.
   *
   * @throws RangeNotClosedError if any range is unbounded
   */
  enumerateDays(): Iterable<LocalDate> {
    const perRange = this.ranges.map((range) => range.enumerateDays())
    return {
      *[Symbol.iterator]() {
        for (const days of perRange) {
          yield* days
        }
      },
    }
  }

  // --------------------------------------------------------------------------
  // Serialization
  // --------------------------------------------------------------------------

  toArray(): SerializedIntervalSet {
    return this.ranges.map((range) => range.toArray())
  }

  toJSON(): SerializedIntervalSet {
    return this.toArray()
  }
}

/** True when no day separates `end` from a later-or-equal `start`. */
function touches(end: Bound, start: Bound): boolean {
  const dayBefore = shiftBound(start, -1)
  return dayBefore === null || !endsBeforeStart(end, dayBefore)
}

function widen(range: Interval, start: Bound, end: Bound): Interval {
  if (start === range.startBound && end === range.endBound) return range
  return Interval.fromBounds(start, end)
}
