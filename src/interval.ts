/**
 * Interval
 *
 * An immutable, inclusive span of calendar days whose start and end may each
 * be unbounded. All algebra goes through the side-aware bound orderings in
 * ./bound, so no method branches on open/half-open/closed itself.
 */

import {
  type LocalDate,
  parseDate,
  makeDate,
  daysInMonth,
  addDays,
  daysBetween,
} from './time-date'
import {
  type Bound,
  unbounded,
  bounded,
  dateOfBound,
  boundEquals,
  shiftBound,
  compareStarts,
  compareEnds,
  laterStart,
  earlierEnd,
  endsBeforeStart,
} from './bound'
import { BoundPairSchema, describeIssues, type SerializedInterval } from './schemas'
import { InvalidInputError, InvalidRangeError, RangeNotClosedError } from './errors'

export { InvalidInputError, InvalidRangeError, RangeNotClosedError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** A concrete day, a `YYYY-MM-DD` string, or an empty value meaning "unbounded". */
export type DateInput = LocalDate | string | null | undefined

/**
 * Result of comparing two intervals.
 *
 * `before` and `after` are the parts outside the intersection: the leading
 * part of whichever interval starts first and the trailing part of whichever
 * ends last. When the intervals are disjoint they are the two intervals
 * themselves. The `FromThis` flags say whether a fragment belongs to the
 * receiver and are null exactly when their fragment is.
 */
export type IntervalComparison = {
  before: Interval | null
  beforeFromThis: boolean | null
  intersection: Interval | null
  after: Interval | null
  afterFromThis: boolean | null
}

// ============================================================================
// Helpers
// ============================================================================

const MONTH_PATTERN = /^(\d{4})-(\d{2})$/

function toBound(input: DateInput, side: 'start' | 'end'): Bound {
  if (input === null || input === undefined || input === '') return unbounded
  const parsed = parseDate(input)
  if (!parsed.ok) throw new InvalidInputError(`Invalid ${side} date format: ${parsed.error.message}`)
  return bounded(parsed.value)
}

/**
 * Parses a day given as a string.
 *
 * @throws InvalidInputError if it is not a valid `YYYY-MM-DD` date
 */
export function requireDate(input: LocalDate | string): LocalDate {
  const parsed = parseDate(input)
  if (!parsed.ok) throw new InvalidInputError(parsed.error.message)
  return parsed.value
}

function describeBound(bound: Bound, side: 'start' | 'end'): string {
  const date = dateOfBound(bound)
  if (date !== null) return date
  return side === 'start' ? '-∞' : '+∞'
}

// ============================================================================
// Interval
// ============================================================================

export class Interval {
  private constructor(
    readonly startBound: Bound,
    readonly endBound: Bound,
  ) {
    Object.freeze(this)
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  /**
   * Creates an interval from two optional dates.
   *
   * @throws InvalidInputError if a date string is not a valid `YYYY-MM-DD` date
   * @throws InvalidRangeError if both dates are given and end is before start
   */
  static make(start?: DateInput, end?: DateInput): Interval {
    return Interval.fromBounds(toBound(start, 'start'), toBound(end, 'end'))
  }

  static fromBounds(start: Bound, end: Bound): Interval {
    if (endsBeforeStart(end, start)) {
      throw new InvalidRangeError(
        `End date ${describeBound(end, 'end')} is before start date ${describeBound(start, 'start')}`
      )
    }
    return new Interval(start, end)
  }

  /** 1 January through 31 December of the given year. */
  static year(year: number): Interval {
    if (!Number.isInteger(year) || year < 0 || year > 9999) {
      throw new InvalidInputError(`Invalid year: ${year}`)
    }
    return new Interval(bounded(makeDate(year, 1, 1)), bounded(makeDate(year, 12, 31)))
  }

  /** First through last day of a `YYYY-MM` month. */
  static month(month: string): Interval {
    const match = MONTH_PATTERN.exec(month)
    const year = match ? parseInt(match[1] ?? '', 10) : NaN
    const monthNumber = match ? parseInt(match[2] ?? '', 10) : NaN
    if (Number.isNaN(year) || Number.isNaN(monthNumber) || monthNumber < 1 || monthNumber > 12) {
      throw new InvalidInputError(`Invalid month string: '${month}'`)
    }
    return new Interval(
      bounded(makeDate(year, monthNumber, 1)),
      bounded(makeDate(year, monthNumber, daysInMonth(year, monthNumber)))
    )
  }

  /**
   * Inverse of {@link Interval.toArray}. Empty strings read as unbounded.
   *
   * @throws InvalidInputError if the value is not a pair of date strings or nulls
   * @throws InvalidRangeError if end is before start
   */
  static fromArray(value: unknown): Interval {
    const parsed = BoundPairSchema.safeParse(value)
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid date range array: ${describeIssues(parsed.error)}`)
    }
    const [start, end] = parsed.data
    return Interval.make(start, end)
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get start(): LocalDate | null {
    return dateOfBound(this.startBound)
  }

  get end(): LocalDate | null {
    return dateOfBound(this.endBound)
  }

  hasStart(): boolean {
    return this.startBound.kind === 'bounded'
  }

  hasEnd(): boolean {
    return this.endBound.kind === 'bounded'
  }

  isClosed(): boolean {
    return this.hasStart() && this.hasEnd()
  }

  isHalfOpen(): boolean {
    return this.hasStart() !== this.hasEnd()
  }

  isOpen(): boolean {
    return !this.hasStart() && !this.hasEnd()
  }

  withStart(start: DateInput): Interval {
    return Interval.fromBounds(toBound(start, 'start'), this.endBound)
  }

  withEnd(end: DateInput): Interval {
    return Interval.fromBounds(this.startBound, toBound(end, 'end'))
  }

  // --------------------------------------------------------------------------
  // Algebra
  // --------------------------------------------------------------------------

  /** @throws InvalidInputError if `date` is not a valid `YYYY-MM-DD` date */
  contains(date: LocalDate | string): boolean {
    const day = bounded(requireDate(date))
    return compareStarts(this.startBound, day) <= 0 && compareEnds(day, this.endBound) <= 0
  }

  overlaps(other: Interval): boolean {
    return !endsBeforeStart(this.endBound, other.startBound) && !endsBeforeStart(other.endBound, this.startBound)
  }

  intersect(other: Interval): Interval | null {
    const start = laterStart(this.startBound, other.startBound)
    const end = earlierEnd(this.endBound, other.endBound)
    if (endsBeforeStart(end, start)) return null
    return new Interval(start, end)
  }

  compare(other: Interval): IntervalComparison {
    const startOrder = compareStarts(this.startBound, other.startBound)
    const intersection = this.intersect(other)

    if (intersection === null) {
      // Disjoint ranges never share a start.
      const thisFirst = startOrder < 0
      return {
        before: thisFirst ? this : other,
        beforeFromThis: thisFirst,
        intersection: null,
        after: thisFirst ? other : this,
        afterFromThis: !thisFirst,
      }
    }

    const endOrder = compareEnds(this.endBound, other.endBound)

    // When starts differ the intersection starts at the later, concrete one,
    // so the day before it is still on or after the earlier start. Past the
    // edge of the calendar there is no such day and no fragment.
    const leading = startOrder < 0 ? this : other
    const beforeEnd = startOrder === 0 ? null : shiftBound(intersection.startBound, -1)
    const before = beforeEnd === null ? null : new Interval(leading.startBound, beforeEnd)

    const trailing = endOrder > 0 ? this : other
    const afterStart = endOrder === 0 ? null : shiftBound(intersection.endBound, 1)
    const after = afterStart === null ? null : new Interval(afterStart, trailing.endBound)

    return {
      before,
      beforeFromThis: before === null ? null : startOrder < 0,
      intersection,
      after,
      afterFromThis: after === null ? null : endOrder > 0,
    }
  }

  /**
   * The parts of this interval not covered by `other`: zero, one or two
   * fragments in ascending order, never adjacent to each other.
   */
  subtract(other: Interval): readonly Interval[] {
    const { before, beforeFromThis, after, afterFromThis } = this.compare(other)
    const fragments: Interval[] = []
    if (before !== null && beforeFromThis === true) fragments.push(before)
    if (after !== null && afterFromThis === true) fragments.push(after)
    return Object.freeze(fragments)
  }

  equals(other: Interval): boolean {
    return boundEquals(this.startBound, other.startBound) && boundEquals(this.endBound, other.endBound)
  }

  // --------------------------------------------------------------------------
  // Closed-range operations
  // --------------------------------------------------------------------------

  /** Number of days covered, both ends included. */
  lengthInDays(): number {
    const [first, last] = this.closedDates()
    return daysBetween(first, last) + 1
  }

  /**
   * Every day from start to end inclusive. The returned iterable is lazy and
   * can be iterated more than once.
   */
  enumerateDays(): Iterable<LocalDate> {
    const [first, last] = this.closedDates()
    const count = daysBetween(first, last)
    return {
      *[Symbol.iterator]() {
        for (let n = 0; n <= count; n++) {
          yield addDays(first, n)
        }
      },
    }
  }

  private closedDates(): [LocalDate, LocalDate] {
    const first = this.start
    const last = this.end
    if (first === null || last === null) {
      throw new RangeNotClosedError(`Date range ${this.toString()} is not closed`)
    }
    return [first, last]
  }

  // --------------------------------------------------------------------------
  // Serialization
  // --------------------------------------------------------------------------

  toArray(): SerializedInterval {
    return [this.start, this.end]
  }

  toJSON(): SerializedInterval {
    return this.toArray()
  }

  toString(): string {
    return `[${describeBound(this.startBound, 'start')}, ${describeBound(this.endBound, 'end')}]`
  }
}
