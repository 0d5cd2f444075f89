/**
 * date-intervals
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  DateIntervalError, DateIntervalErrorCode,
  InvalidRangeError, InvalidInputError, ParseError, RangeNotClosedError,
} from './errors'
export type { DateIntervalErrorCode as DateIntervalErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar dates
export type { LocalDate } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, makeDate, MIN_DATE, MAX_DATE,
  yearOf, monthOf, dayOf,
  addDays, tryAddDays, daysBetween,
  compareDates, dateEquals, dateBefore, dateAfter, minDate, maxDate,
} from './time-date'

// Bounds
export type { Bound, Bounded, Unbounded } from './bound'
export {
  unbounded, bounded, boundOf, isBounded, dateOfBound, boundEquals,
  compareStarts, compareEnds,
} from './bound'

// Serialized forms
export type { SerializedInterval, SerializedIntervalSet, BoundPairInput } from './schemas'
export { BoundPairSchema, IntervalSetArraySchema } from './schemas'

// Intervals
export type { DateInput, IntervalComparison } from './interval'
export { Interval } from './interval'
export { IntervalSet } from './interval-set'
