/**
 * Segment 01: Calendar Date Tests
 *
 * Tests the day-granularity date capability the interval algebra consumes:
 * parsing, construction, arithmetic and ordering.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDate,
  makeDate,
  MIN_DATE,
  MAX_DATE,
  yearOf,
  monthOf,
  dayOf,
  isLeapYear,
  daysInMonth,
  addDays,
  tryAddDays,
  daysBetween,
  compareDates,
  dateEquals,
  dateBefore,
  dateAfter,
  minDate,
  maxDate,
  ParseError,
} from '../src/time-date'
import { d } from './helpers/dates'

// ============================================================================
// 1. PARSING
// ============================================================================

describe('parseDate', () => {
  it('parses a standard date', () => {
    const result = parseDate('2024-03-15')
    expect(result).toEqual({ ok: true, value: '2024-03-15' })
  })

  it('parses a leap day in a leap year', () => {
    expect(parseDate('2024-02-29').ok).toBe(true)
  })

  it('rejects Feb 29 in a non-leap year', () => {
    const result = parseDate('2023-02-29')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError)
      expect(result.error.message).toBe("Invalid day in date: '2023-02-29'")
    }
  })

  it('rejects month 13', () => {
    const result = parseDate('2024-13-01')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid month in date: '2024-13-01'")
  })

  it('rejects day zero', () => {
    expect(parseDate('2024-01-00').ok).toBe(false)
  })

  it('rejects unpadded components', () => {
    const result = parseDate('2024-1-01')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid date format: '2024-1-01'")
  })

  it('rejects a datetime', () => {
    expect(parseDate('2024-01-01T00:00:00').ok).toBe(false)
  })

  it('rejects the empty string', () => {
    expect(parseDate('').ok).toBe(false)
  })
})

// ============================================================================
// 2. CONSTRUCTION & COMPONENTS
// ============================================================================

describe('makeDate and components', () => {
  it('zero-pads every component', () => {
    expect(makeDate(5, 3, 7)).toBe('0005-03-07')
  })

  it('extracts year, month and day', () => {
    const date = d('2021-11-09')
    expect(yearOf(date)).toBe(2021)
    expect(monthOf(date)).toBe(11)
    expect(dayOf(date)).toBe(9)
  })

  it('spans the four-digit years', () => {
    expect(MIN_DATE).toBe('0000-01-01')
    expect(MAX_DATE).toBe('9999-12-31')
  })
})

// ============================================================================
// 3. CALENDAR RULES
// ============================================================================

describe('calendar rules', () => {
  it('applies the Gregorian leap-year rule', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(2023)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
  })

  it('knows month lengths', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2023, 4)).toBe(30)
    expect(daysInMonth(2023, 12)).toBe(31)
  })
})

// ============================================================================
// 4. ARITHMETIC
// ============================================================================

describe('addDays', () => {
  it('crosses into a leap day', () => {
    expect(addDays(d('2024-02-28'), 1)).toBe('2024-02-29')
  })

  it('skips Feb 29 in a common year', () => {
    expect(addDays(d('2023-02-28'), 1)).toBe('2023-03-01')
  })

  it('crosses a year boundary forwards and backwards', () => {
    expect(addDays(d('2024-12-31'), 1)).toBe('2025-01-01')
    expect(addDays(d('2024-01-01'), -1)).toBe('2023-12-31')
  })

  it('is the identity for zero', () => {
    expect(addDays(d('2021-06-15'), 0)).toBe('2021-06-15')
  })

  it('moves many days at once', () => {
    expect(addDays(d('2021-01-01'), 365)).toBe('2022-01-01')
  })
})

describe('tryAddDays', () => {
  it('moves within the calendar like addDays', () => {
    expect(tryAddDays(d('9999-12-30'), 1)).toBe('9999-12-31')
    expect(tryAddDays(d('0000-01-02'), -1)).toBe('0000-01-01')
    expect(tryAddDays(d('0000-12-31'), 1)).toBe('0001-01-01')
  })

  it('returns null past either edge', () => {
    expect(tryAddDays(d('9999-12-31'), 1)).toBeNull()
    expect(tryAddDays(d('0000-01-01'), -1)).toBeNull()
  })
})

describe('daysBetween', () => {
  it('counts whole days across a leap year', () => {
    expect(daysBetween(d('2024-01-01'), d('2024-12-31'))).toBe(365)
    expect(daysBetween(d('2023-01-01'), d('2023-12-31'))).toBe(364)
  })

  it('is negative when the second date is earlier', () => {
    expect(daysBetween(d('2024-03-01'), d('2024-02-28'))).toBe(-2)
  })

  it('is zero for the same date', () => {
    expect(daysBetween(d('2021-01-01'), d('2021-01-01'))).toBe(0)
  })

  it('inverts addDays', () => {
    const start = d('2020-02-10')
    expect(daysBetween(start, addDays(start, 400))).toBe(400)
  })
})

// ============================================================================
// 5. COMPARISON
// ============================================================================

describe('comparison', () => {
  const early = d('2021-01-31')
  const late = d('2021-02-01')

  it('orders dates', () => {
    expect(compareDates(early, late)).toBe(-1)
    expect(compareDates(late, early)).toBe(1)
    expect(compareDates(early, d('2021-01-31'))).toBe(0)
  })

  it('answers before/after/equals', () => {
    expect(dateBefore(early, late)).toBe(true)
    expect(dateAfter(early, late)).toBe(false)
    expect(dateEquals(early, d('2021-01-31'))).toBe(true)
  })

  it('picks the min and max', () => {
    expect(minDate(late, early)).toBe('2021-01-31')
    expect(maxDate(early, late)).toBe('2021-02-01')
  })
})
